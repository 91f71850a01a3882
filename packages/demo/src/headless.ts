import { runDemo } from './demo-scenario.js';

runDemo({ headless: true, scenarioPath: process.argv[2] }).catch((err: unknown) => {
  console.error('Headless run failed:', err);
  process.exit(1);
});
