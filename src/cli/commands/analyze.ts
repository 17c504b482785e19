import type { Command } from 'commander';
import { ModelRegistry } from '../../ai/model-registry.js';
import { RequestRouter } from '../../ai/request-router.js';
import { createRequest, type RoutingDecision } from '../../ai/types.js';
import { NoModelsAvailableError } from '../../ai/errors.js';
import { loadCliConfig, printJson, type ConfigOption } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ANALYZE CLI COMMAND
// ═══════════════════════════════════════════════════════════════════════════════

interface AnalyzeOptions extends ConfigOption {
  format?: string;
  fastest?: boolean;
  json?: boolean;
}

/**
 * Offline: classifies the prompt and explains which configured model the
 * router would pick. No model is called.
 */
export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze <prompt>')
    .description('Classify a prompt and show the routing decision')
    .option('-c, --config <path>', 'Configuration file')
    .option('-f, --format <type>', 'Requested response format (text or json)', 'text')
    .option('--fastest', 'Prefer the fastest model')
    .option('--json', 'Output as JSON')
    .action((prompt: string, options: AnalyzeOptions) => {
      const config = loadCliConfig(options);
      if (!config) return;

      const router = new RequestRouter(ModelRegistry.fromConfig(config));
      const request = createRequest(prompt, {
        responseFormat: { type: options.format === 'json' ? 'json_object' : 'text' },
        useFastest: options.fastest === true,
      });
      const analysis = router.analyze(request);

      let decision: RoutingDecision | null = null;
      try {
        decision = router.route(request);
      } catch (error) {
        if (!(error instanceof NoModelsAvailableError)) throw error;
      }

      if (options.json) {
        printJson({ analysis, decision });
        return;
      }

      console.log(`Task type:   ${analysis.taskType}`);
      console.log(`Complexity:  ${analysis.complexity}`);
      console.log(`Tokens:      ~${analysis.estimatedTokens}`);
      console.log(`Confidence:  ${analysis.confidence.toFixed(2)}`);
      console.log(`Keywords:    ${analysis.keywords.join(', ') || '-'}`);
      if (decision) {
        console.log(`Model:       ${decision.modelName} (${decision.mode})`);
        console.log(`Reasoning:   ${decision.reasoning}`);
      } else {
        console.log('Model:       none (no enabled models configured)');
      }
    });
}
