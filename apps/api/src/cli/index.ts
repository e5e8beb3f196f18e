import 'dotenv/config';
import { Command } from 'commander';
import { loadRuntimeConfig } from '../config/runtime.js';
import { createRuntime } from '../runtime.js';
import { registerRunScenarioCommand } from './commands/run-scenario.js';

const program = new Command();

program
  .name('scenario-runner')
  .description('Scenario runner command line')
  .version('0.1.0');

registerRunScenarioCommand(program, () => createRuntime(loadRuntimeConfig()));

program.parseAsync(process.argv).catch((err: Error) => {
  console.error('Error:', err.message);
  process.exit(1);
});
