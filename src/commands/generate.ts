import { Command, InvalidArgumentError } from 'commander';
import { logger } from '../utils/logger.js';
import { loadConfig } from '../config/loader.js';
import { isScriptdocError } from '../errors.js';
import { createCompletionClient } from '../llm/index.js';
import { exitCodeFor, runPipeline } from '../pipeline/run.js';

interface GenerateOptions {
  envFile?: string;
  template?: string;
  model?: string;
  baseUrl?: string;
  timeout?: number;
}

function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError('Timeout must be a positive number of milliseconds.');
  }
  return ms;
}

export function createGenerateCommand() {
  return new Command('generate')
    .description('Generate Markdown documentation for a notebook script and print it to stdout')
    .argument('<file>', 'Path to the notebook script (.py)')
    .option('--env-file <path>', 'Path to the .env file holding the encrypted API key')
    .option('--template <path>', 'Prompt template to use instead of templates/prompt.md')
    .option('--model <name>', 'Model to request')
    .option('--base-url <url>', 'Base URL of the OpenAI-compatible API')
    .option('--timeout <ms>', 'Request timeout in milliseconds', parseTimeout)
    .action(async (file: string, options: GenerateOptions) => {
      try {
        const cwd = process.cwd();
        const config = await loadConfig(cwd);

        const client = createCompletionClient({
          baseUrl: options.baseUrl ?? config.llm.baseUrl,
          model: options.model ?? config.llm.model,
          timeoutMs: options.timeout ?? config.llm.timeoutMs,
        });

        logger.info(`Documenting ${file}...`);

        const outcome = await runPipeline(
          {
            filePath: file,
            cwd,
            envPath: options.envFile ?? config.envPath,
            templatePath: options.template ?? config.template,
          },
          { client, output: process.stdout }
        );

        if (outcome.state === 'done') {
          logger.success(`Documentation generated for ${file}`);
        }
        process.exitCode = exitCodeFor(outcome);
      } catch (error) {
        if (isScriptdocError(error)) {
          logger.error(error.message);
        } else {
          logger.error('Failed to generate documentation:', error);
        }
        process.exitCode = 1;
      }
    });
}
