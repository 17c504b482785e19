import type { Command } from 'commander';
import { ModelRegistry } from '../../ai/model-registry.js';
import { MODEL_ROLES } from '../../ai/types.js';
import { loadCliConfig, printJson, type ConfigOption } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// MODELS CLI COMMAND
// ═══════════════════════════════════════════════════════════════════════════════

export function registerModelsCommand(program: Command): void {
  program
    .command('models')
    .description('Show the models of the default provider grouped by role')
    .option('-c, --config <path>', 'Configuration file')
    .option('--json', 'Output as JSON')
    .action((options: ConfigOption & { json?: boolean }) => {
      const config = loadCliConfig(options);
      if (!config) return;

      const registry = ModelRegistry.fromConfig(config);
      if (options.json) {
        printJson(registry.getAll());
        return;
      }

      console.log(`Provider: ${config.llm.default_provider}`);
      if (registry.size === 0) {
        console.log('No models configured');
        return;
      }

      for (const role of MODEL_ROLES) {
        const models = registry.getAll().filter((model) => model.role === role);
        if (models.length === 0) continue;
        console.log(`${role.toUpperCase()}:`);
        for (const model of models) {
          console.log(`  ${model.name} (max_tokens=${model.maxTokens}, context=${model.contextWindow})`);
        }
      }
    });
}
