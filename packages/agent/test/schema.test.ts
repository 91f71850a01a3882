import { describe, it, expect } from 'vitest';
import { validateScenarioConfig, formatValidationErrors } from '../src/schema.js';
import type { ErrorObject } from 'ajv';

/** Scenario exercising every config field. */
function fullScenario() {
  return {
    name: 'Corner sweep',
    description: 'Three fixed targets near the corners',
    config: {
      width: 12,
      height: 12,
      agentCount: 3,
      targetCount: 2,
      byzantineIndex: 0,
      byzantineStrategy: { kind: 'offset', dx: 2, dy: -1 },
      communicationRange: 4,
      sensorRange: 2,
      tolerance: 1,
      quorum: 2,
      stepBudget: 40,
      pathHistoryLength: 10,
      seed: 'corner',
      agentStarts: [
        { x: 0, y: 0 },
        { x: 5, y: 5 },
        { x: 11, y: 11 },
      ],
      targets: [
        { position: { x: 1, y: 10 }, motion: { kind: 'stationary' } },
        {
          position: { x: 10, y: 1 },
          motion: { kind: 'waypoints', period: 3, waypoints: [{ x: 10, y: 4 }, { x: 7, y: 1 }] },
        },
      ],
    },
  };
}

function errorsFor(data: unknown): string[] {
  const result = validateScenarioConfig(data);
  return result.valid ? [] : result.errors;
}

describe('validateScenarioConfig', () => {
  it('accepts a scenario with every field set', () => {
    const result = validateScenarioConfig(fullScenario());
    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.scenario.name).toBe('Corner sweep');
      expect(result.scenario.config.targets).toHaveLength(2);
    }
  });

  it('accepts a scenario that leaves the whole config to defaults', () => {
    expect(validateScenarioConfig({ name: 'Defaults', config: {} }).valid).toBe(true);
  });

  it('accepts a null Byzantine index for an all-honest fleet', () => {
    const scenario = fullScenario();
    expect(validateScenarioConfig({ ...scenario, config: { ...scenario.config, byzantineIndex: null } }).valid).toBe(true);
  });

  it('accepts the swap strategy and a random-walk target', () => {
    const scenario = fullScenario();
    const config = {
      ...scenario.config,
      byzantineStrategy: { kind: 'swap' },
      targets: [
        { position: { x: 1, y: 10 }, motion: { kind: 'random-walk', period: 2 } },
        { position: { x: 10, y: 1 }, motion: { kind: 'stationary' } },
      ],
    };
    expect(validateScenarioConfig({ ...scenario, config }).valid).toBe(true);
  });

  it('rejects a non-object document', () => {
    expect(errorsFor('not a scenario')).toContain('scenario must be of type object');
  });

  it('rejects a missing name', () => {
    const { name: _, ...scenario } = fullScenario();
    expect(errorsFor(scenario)).toContain('Missing required property: name');
  });

  it('rejects a missing config', () => {
    const { config: _, ...scenario } = fullScenario();
    expect(errorsFor(scenario)).toContain('Missing required property: config');
  });

  it('rejects an empty name', () => {
    expect(errorsFor({ ...fullScenario(), name: '' })).toContain('name must not be empty');
  });

  it('rejects unknown top-level properties', () => {
    expect(errorsFor({ ...fullScenario(), speed: 3 })).toContain('scenario has unknown property: speed');
  });

  it('rejects unknown config properties', () => {
    const scenario = fullScenario();
    expect(errorsFor({ ...scenario, config: { ...scenario.config, diagonal: true } })).toContain(
      'config has unknown property: diagonal',
    );
  });

  it('rejects a zero-width grid', () => {
    const scenario = fullScenario();
    expect(errorsFor({ ...scenario, config: { ...scenario.config, width: 0 } })).toContain('config.width must be >= 1');
  });

  it('rejects a fractional agent count', () => {
    const scenario = fullScenario();
    expect(errorsFor({ ...scenario, config: { ...scenario.config, agentCount: 2.5 } })).toContain(
      'config.agentCount must be of type integer',
    );
  });

  it('rejects an empty seed', () => {
    const scenario = fullScenario();
    expect(errorsFor({ ...scenario, config: { ...scenario.config, seed: '' } })).toContain('config.seed must not be empty');
  });

  it('points at the failing start cell', () => {
    const scenario = fullScenario();
    const agentStarts = [{ x: 0, y: 0 }, { x: -1, y: 5 }, { x: 11, y: 11 }];
    expect(errorsFor({ ...scenario, config: { ...scenario.config, agentStarts } })).toContain(
      'config.agentStarts[1].x must be >= 0',
    );
  });

  it('rejects an unknown Byzantine strategy', () => {
    const scenario = fullScenario();
    const config = { ...scenario.config, byzantineStrategy: { kind: 'mirror' } };
    expect(errorsFor({ ...scenario, config })).toContain('config.byzantineStrategy.kind must be a known kind');
  });

  it('rejects an offset strategy without dy', () => {
    const scenario = fullScenario();
    const config = { ...scenario.config, byzantineStrategy: { kind: 'offset', dx: 3 } };
    expect(errorsFor({ ...scenario, config })).toContain('Missing required property: config.byzantineStrategy.dy');
  });

  it('rejects an empty waypoint list', () => {
    const scenario = fullScenario();
    const targets = [
      scenario.config.targets[0],
      { position: { x: 10, y: 1 }, motion: { kind: 'waypoints', period: 3, waypoints: [] } },
    ];
    expect(errorsFor({ ...scenario, config: { ...scenario.config, targets } })).toContain(
      'config.targets[1].motion.waypoints must have at least 1 item(s)',
    );
  });

  it('rejects a random-walk target without a period', () => {
    const scenario = fullScenario();
    const targets = [{ position: { x: 1, y: 10 }, motion: { kind: 'random-walk' } }, scenario.config.targets[1]];
    expect(errorsFor({ ...scenario, config: { ...scenario.config, targets } })).toContain(
      'Missing required property: config.targets[0].motion.period',
    );
  });

  it('reports every error at once', () => {
    const scenario = fullScenario();
    const errors = errorsFor({ ...scenario, config: { ...scenario.config, width: 0, quorum: 0 } });
    expect(errors).toEqual(expect.arrayContaining(['config.width must be >= 1', 'config.quorum must be >= 1']));
  });
});

describe('formatValidationErrors', () => {
  it('falls back to the validator message for other keywords', () => {
    const errors: ErrorObject[] = [
      { keyword: 'pattern', instancePath: '/name', schemaPath: '#/properties/name/pattern', params: {}, message: 'must match pattern' },
    ];
    expect(formatValidationErrors(errors)).toEqual(['name must match pattern']);
  });

  it('names the scenario root when the path is empty', () => {
    const errors: ErrorObject[] = [
      { keyword: 'required', instancePath: '', schemaPath: '#/required', params: { missingProperty: 'config' } },
      { keyword: 'minItems', instancePath: '/config/targets', schemaPath: '', params: { limit: 1 } },
    ];
    expect(formatValidationErrors(errors)).toEqual([
      'Missing required property: config',
      'config.targets must have at least 1 item(s)',
    ]);
  });
});
