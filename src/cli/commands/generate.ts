import type { Command } from 'commander';
import { RoutingOrchestrator } from '../../ai/orchestrator.js';
import { createRequest } from '../../ai/types.js';
import { loadCliConfig, printJson, type ConfigOption } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// GENERATE CLI COMMAND
// ═══════════════════════════════════════════════════════════════════════════════

interface GenerateOptions extends ConfigOption {
  adaptive?: boolean;
  parallel?: boolean;
  fastest?: boolean;
  model?: string;
  jsonFormat?: boolean;
  json?: boolean;
}

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate <prompt>')
    .description('Generate a response through the configured provider')
    .option('-c, --config <path>', 'Configuration file')
    .option('-a, --adaptive', 'Let the adaptive strategy manager choose the strategy')
    .option('-p, --parallel', 'Request parallel generation')
    .option('--fastest', 'Prefer the fastest model')
    .option('-m, --model <name>', 'Preferred model')
    .option('--json-format', 'Require a JSON object response')
    .option('--json', 'Output the full result as JSON')
    .action(async (prompt: string, options: GenerateOptions) => {
      const config = loadCliConfig(options);
      if (!config) return;

      try {
        const orchestrator = RoutingOrchestrator.fromConfig(config);
        const result = await orchestrator.generate(
          createRequest(prompt, {
            modelName: options.model,
            useParallel: options.parallel === true,
            useFastest: options.fastest === true,
            responseFormat: options.jsonFormat ? { type: 'json_object' } : undefined,
          }),
          { adaptive: options.adaptive === true },
        );
        await orchestrator.drainLearning();

        if (options.json) {
          printJson(result);
        } else if (result.success) {
          console.log(result.content);
        } else {
          console.error(`Generation failed (${result.modelName}): ${result.error ?? 'unknown error'}`);
        }
        if (!result.success) {
          process.exitCode = 1;
        }
      } catch (error) {
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
      }
    });
}
