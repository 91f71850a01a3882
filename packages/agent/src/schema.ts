import { Ajv } from 'ajv';
import type { ErrorObject } from 'ajv';
import type { SimulationConfigInput } from '@swarmgrid/core';

/** Shape of a scenario JSON file before defaults are applied. */
export interface ScenarioFile {
  readonly name: string;
  readonly description?: string;
  readonly config: SimulationConfigInput;
}

const positionSchema = {
  type: 'object',
  required: ['x', 'y'],
  additionalProperties: false,
  properties: {
    x: { type: 'integer', minimum: 0 },
    y: { type: 'integer', minimum: 0 },
  },
} as const;

const periodSchema = { type: 'integer', minimum: 1 } as const;

/** JSON Schema for scenario files under examples/scenarios. */
const scenarioSchema = {
  type: 'object',
  required: ['name', 'config'],
  additionalProperties: false,
  properties: {
    name: { type: 'string', minLength: 1 },
    description: { type: 'string' },
    config: {
      type: 'object',
      additionalProperties: false,
      properties: {
        width: { type: 'integer', minimum: 1 },
        height: { type: 'integer', minimum: 1 },
        agentCount: { type: 'integer', minimum: 1 },
        targetCount: { type: 'integer', minimum: 1 },
        byzantineIndex: { type: 'integer', minimum: 0, nullable: true },
        byzantineStrategy: {
          type: 'object',
          required: ['kind'],
          discriminator: { propertyName: 'kind' },
          oneOf: [
            {
              required: ['kind', 'dx', 'dy'],
              additionalProperties: false,
              properties: {
                kind: { const: 'offset' },
                dx: { type: 'integer' },
                dy: { type: 'integer' },
              },
            },
            {
              additionalProperties: false,
              properties: { kind: { const: 'swap' } },
            },
          ],
        },
        communicationRange: { type: 'number', minimum: 0 },
        sensorRange: { type: 'number', minimum: 0 },
        tolerance: { type: 'number', minimum: 0 },
        quorum: { type: 'integer', minimum: 1 },
        sweepSpacing: { type: 'integer', minimum: 1 },
        stepBudget: { type: 'integer', minimum: 1 },
        pathHistoryLength: { type: 'integer', minimum: 1 },
        seed: { type: 'string', minLength: 1 },
        agentStarts: { type: 'array', minItems: 1, items: positionSchema },
        targets: {
          type: 'array',
          minItems: 1,
          items: {
            type: 'object',
            required: ['position', 'motion'],
            additionalProperties: false,
            properties: {
              position: positionSchema,
              motion: {
                type: 'object',
                required: ['kind'],
                discriminator: { propertyName: 'kind' },
                oneOf: [
                  {
                    additionalProperties: false,
                    properties: { kind: { const: 'stationary' } },
                  },
                  {
                    required: ['kind', 'period'],
                    additionalProperties: false,
                    properties: { kind: { const: 'random-walk' }, period: periodSchema },
                  },
                  {
                    required: ['kind', 'waypoints', 'period'],
                    additionalProperties: false,
                    properties: {
                      kind: { const: 'waypoints' },
                      waypoints: { type: 'array', minItems: 1, items: positionSchema },
                      period: periodSchema,
                    },
                  },
                ],
              },
            },
          },
        },
      },
    },
  },
} as const;

const ajv = new Ajv({ allErrors: true, discriminator: true });
const validate = ajv.compile<ScenarioFile>(scenarioSchema);

/**
 * Transform an ajv instance path from JSON pointer to dot-notation.
 *
 * @param instancePath - JSON pointer string, e.g. `/config/targets/0/motion`
 * @returns Dot-notation string, e.g. `config.targets[0].motion`
 */
function formatPath(instancePath: string): string {
  return instancePath
    .replace(/^\//, '')
    .replace(/\/(\d+)\//g, '[$1].')
    .replace(/\/(\d+)$/g, '[$1]')
    .replace(/\//g, '.');
}

/**
 * Transform ajv error objects into human-readable messages with instance paths.
 *
 * @param errors - Array of ajv ErrorObject entries
 * @returns Human-readable error strings pointing to the exact failing field
 */
export function formatValidationErrors(errors: ErrorObject[]): string[] {
  return errors.map((err) => {
    const path = formatPath(err.instancePath);
    const at = path === '' ? 'scenario' : path;

    if (err.keyword === 'required') {
      const missingProp = err.params.missingProperty as string;
      const prefix = path ? `${path}.` : '';
      return `Missing required property: ${prefix}${missingProp}`;
    }

    if (err.keyword === 'const') {
      return `${at} must be ${JSON.stringify(err.params.allowedValue)}`;
    }

    if (err.keyword === 'discriminator') {
      return `${at}.kind must be a known kind`;
    }

    if (err.keyword === 'minItems') {
      return `${at} must have at least ${err.params.limit as number} item(s)`;
    }

    if (err.keyword === 'minLength') {
      return `${at} must not be empty`;
    }

    if (err.keyword === 'minimum') {
      return `${at} must be >= ${err.params.limit as number}`;
    }

    if (err.keyword === 'type') {
      return `${at} must be of type ${String(err.params.type)}`;
    }

    if (err.keyword === 'additionalProperties') {
      return `${at} has unknown property: ${err.params.additionalProperty as string}`;
    }

    return `${at} ${err.message ?? 'is invalid'}`;
  });
}

/**
 * Validate raw data against the scenario JSON Schema.
 *
 * @param data - Unknown data to validate (typically parsed JSON)
 * @returns Discriminated union: `{ valid: true, scenario }` or `{ valid: false, errors }`
 */
export function validateScenarioConfig(
  data: unknown,
): { valid: true; scenario: ScenarioFile } | { valid: false; errors: string[] } {
  if (validate(data)) {
    return { valid: true, scenario: data };
  }

  const errors = formatValidationErrors(validate.errors ?? []);
  return { valid: false, errors };
}
