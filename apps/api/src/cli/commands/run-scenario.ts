import type { Command } from 'commander';
import { writeFileSync } from 'node:fs';
import type { Runtime } from '../../runtime.js';
import { serializeScenario } from '../../serializers.js';
import { loadConfigFile } from '../config-file.js';

export type RuntimeFactory = () => Runtime;

interface RunScenarioOptions {
  name: string;
  config?: string;
  output?: string;
  async?: boolean;
}

export function registerRunScenarioCommand(program: Command, openRuntime: RuntimeFactory): void {
  program
    .command('run-scenario')
    .description('Create a scenario and run it to completion')
    .requiredOption('--name <name>', 'Name of the scenario to run')
    .option('--config <path>', 'Path to a JSON or YAML config file')
    .option('--output <path>', 'Also write the resulting record to this file')
    .option('--async', 'Accepted for parity with the HTTP API; the CLI always runs inline', false)
    .action(async (opts: RunScenarioOptions) => {
      const runtime = openRuntime();
      try {
        await runtime.store.init();
        const config = opts.config ? loadConfigFile(opts.config) : null;

        const created = await runtime.scenarios.create({ name: opts.name, config });
        if (!created.ok) throw created.error;

        const reserved = await runtime.tasks.create(created.value.id);
        if (!reserved.ok) throw reserved.error;

        runtime.dispatcher.submit({
          taskId: reserved.value.taskId,
          scenarioId: reserved.value.scenarioId,
        });
        await runtime.dispatcher.drain();

        const scenario = await runtime.scenarios.get(created.value.id);
        if (!scenario) throw new Error(`scenario ${created.value.id} vanished during the run`);

        const outputJson = JSON.stringify(serializeScenario(scenario), null, 2);
        if (opts.output) writeFileSync(opts.output, outputJson);
        console.log(outputJson);

        if (scenario.status !== 'finished') {
          const task = await runtime.tasks.get(reserved.value.taskId);
          const reason = task.ok && task.value.error ? task.value.error : scenario.status;
          console.error(JSON.stringify({ error: reason, type: 'ExecutionFailure' }, null, 2));
          process.exitCode = 1;
        }
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        console.error(JSON.stringify({ error: error.message, type: error.name }, null, 2));
        process.exitCode = 1;
      } finally {
        await runtime.store.close();
      }
    });
}
