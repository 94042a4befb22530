import { Command } from 'commander';

import type { CommandResult } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { loadConfigDefinition } from '../cli/config-loader.js';
import { emitText } from '../cli/output-target.js';
import { configureApplication, type ConfigureResult } from '../core/pipelines/configure-pipeline.js';
import { resolveOutput } from '../core/ports/resolve.js';
import type { OutputPort } from '../core/ports/output.js';

interface ConfigureCommandOptions {
  file: string;
  output?: string;
}

/**
 * Configure command implementation
 */
export async function runConfigureCommand(
  options: ConfigureCommandOptions,
  argv: readonly string[],
  ctx?: { output?: OutputPort }
): Promise<CommandResult<ConfigureResult>> {
  logger.info(`Configuring ${options.file}`);

  const definition = await loadConfigDefinition(options.file);
  const result = configureApplication(definition, { argv });
  const out = resolveOutput(ctx);
  if (result.evaluation.defaulted.length > 0) {
    logger.info(`Using defaults for: ${result.evaluation.defaulted.join(', ')}`);
  }
  await emitText(result.source, options.output, out);
  return { success: true, data: result };
}

/**
 * Setup the configure command
 */
export function setupConfigureCommand(program: Command): void {
  program
    .command('configure')
    .description('Resolve every key and generate the module instantiating the graph')
    .requiredOption('-f, --file <path>', 'configuration module')
    .option('-o, --output <path>', 'write the generated module to a file instead of stdout')
    .allowUnknownOption(true)
    .allowExcessArguments(true)
    .addHelpText('after', '\nKey values are passed as options, e.g. --port 9000; see `keygraph keys`.')
    .action(withErrorHandling(async (options: ConfigureCommandOptions, command: Command) => {
      await runConfigureCommand(options, command.args);
    }));
}
