import { Command } from 'commander';
import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerGenerateCommand } from './commands/generate.js';
import { registerModelsCommand } from './commands/models.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('llm-router')
    .description('Adaptive LLM routing: classify, route, generate and learn')
    .version(VERSION);

  registerAnalyzeCommand(program);
  registerModelsCommand(program);
  registerGenerateCommand(program);

  return program;
}
