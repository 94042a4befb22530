import { Command } from 'commander';

import type { CommandResult } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { loadConfigDefinition } from '../cli/config-loader.js';
import { emitText } from '../cli/output-target.js';
import { describeConfiguration, type DescribeResult } from '../core/pipelines/describe-pipeline.js';
import { resolveOutput } from '../core/ports/resolve.js';
import type { OutputPort } from '../core/ports/output.js';

interface DescribeCommandOptions {
  file: string;
  eval?: boolean;
  dot?: boolean;
  output?: string;
}

/**
 * Describe command implementation
 *
 * @param argv - arguments left over after the command's own options; key values are read from them
 */
export async function runDescribeCommand(
  options: DescribeCommandOptions,
  argv: readonly string[],
  ctx?: { output?: OutputPort }
): Promise<CommandResult<DescribeResult>> {
  logger.info(`Describing configuration ${options.file}`, { eval: options.eval === true, dot: options.dot === true });

  const definition = await loadConfigDefinition(options.file);
  const result = describeConfiguration(definition, {
    argv,
    fullEval: options.eval === true,
    dot: options.dot === true
  });
  await emitText(result.output, options.output, resolveOutput(ctx));
  return { success: true, data: result };
}

/**
 * Setup the describe command
 */
export function setupDescribeCommand(program: Command): void {
  program
    .command('describe')
    .description('Describe the component graph of a configuration with the given key values')
    .requiredOption('-f, --file <path>', 'configuration module')
    .option('--eval', 'bind every unset key to its default and evaluate everything')
    .option('--dot', 'output the graph in dot format')
    .option('-o, --output <path>', 'write to a file instead of stdout')
    .allowUnknownOption(true)
    .allowExcessArguments(true)
    .addHelpText('after', '\nKey values are passed as options, e.g. --port 9000; see `keygraph keys`.')
    .action(withErrorHandling(async (options: DescribeCommandOptions, command: Command) => {
      await runDescribeCommand(options, command.args);
    }));
}
