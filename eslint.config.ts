import eslint from '@eslint/js';
import tseslint from 'typescript-eslint';

export default tseslint.config(
  eslint.configs.recommended,
  ...tseslint.configs.recommended,
  {
    ignores: ['**/dist/**', '**/node_modules/**', 'examples/**'],
  },
  {
    files: ['packages/core/src/**/*.ts'],
    rules: {
      'no-restricted-imports': ['error', {
        patterns: [
          { group: ['@swarmgrid/agent', '@swarmgrid/demo'], message: 'Core package must not depend on the packages built on it' },
          { group: ['express', 'node:http', 'http', 'node:net', 'net'], message: 'Core package is transport-free: serve it from @swarmgrid/demo' },
        ],
      }],
    },
  },
  {
    files: ['packages/agent/src/**/*.ts'],
    rules: {
      'no-restricted-imports': ['error', {
        patterns: [
          { group: ['@swarmgrid/demo'], message: 'Agent package cannot import the demo surface' },
          { group: ['express', 'node:http', 'http', 'node:net', 'net'], message: 'Agent package is transport-free: serve it from @swarmgrid/demo' },
        ],
      }],
    },
  },
  {
    files: ['packages/agent/src/consensus.ts'],
    rules: {
      'no-restricted-imports': ['error', {
        patterns: [
          { group: ['@swarmgrid/demo'], message: 'Agent package cannot import the demo surface' },
          { group: ['express', 'node:http', 'http', 'node:net', 'net'], message: 'Agent package is transport-free: serve it from @swarmgrid/demo' },
          { group: ['./agent.js', './belief-store.js'], message: 'Consensus sees participants only through ConsensusParticipant' },
        ],
      }],
    },
  },
);
