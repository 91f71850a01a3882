import { readFile } from 'node:fs/promises';
import { ConfigurationError, resolveSimulationConfig } from '@swarmgrid/core';
import type { SimulationConfigInput } from '@swarmgrid/core';
import { validateScenarioConfig } from './schema.js';
import type { Scenario } from './types.js';

/**
 * Load a scenario from a JSON file on disk.
 *
 * Reads the file, parses JSON, validates it against the scenario schema,
 * then resolves defaults and model invariants.
 *
 * @param filePath - Absolute or relative path to the scenario file
 * @param overrides - Fields applied over the file's config, e.g. a seed from the environment
 * @returns Scenario with a fully resolved SimulationConfig
 * @throws Error if the file cannot be read, contains invalid JSON, fails schema validation
 *   or describes an impossible configuration (the ConfigurationError is the cause)
 */
export async function loadScenario(filePath: string, overrides: SimulationConfigInput = {}): Promise<Scenario> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot read scenario file ${filePath}: ${message}`, { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new SyntaxError(`Invalid JSON in scenario file ${filePath}: ${detail}`, { cause: err });
  }

  const result = validateScenarioConfig(data);

  if (!result.valid) {
    const errorList = result.errors.join('\n  - ');
    throw new Error(`Invalid scenario in ${filePath}:\n  - ${errorList}`);
  }

  const { scenario } = result;
  try {
    const config = resolveSimulationConfig({ ...scenario.config, ...overrides });
    return Object.freeze({
      name: scenario.name,
      ...(scenario.description === undefined ? {} : { description: scenario.description }),
      config,
    });
  } catch (err) {
    if (err instanceof ConfigurationError) {
      throw new Error(`Invalid scenario in ${filePath}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}
