import { Command, Option } from 'commander';

import { STAGES } from '../constants/index.js';
import type { CommandResult, Stage } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { loadConfigDefinition } from '../cli/config-loader.js';
import { listKeys, type ListKeysResult } from '../core/pipelines/list-keys-pipeline.js';
import { resolveOutput } from '../core/ports/resolve.js';
import type { OutputPort } from '../core/ports/output.js';

interface KeysCommandOptions {
  file: string;
  stage?: Stage;
}

/**
 * Keys command implementation
 */
export async function runKeysCommand(
  options: KeysCommandOptions,
  ctx?: { output?: OutputPort }
): Promise<CommandResult<ListKeysResult>> {
  const definition = await loadConfigDefinition(options.file);
  const result = listKeys(definition, { stage: options.stage });
  const out = resolveOutput(ctx);
  if (result.keys.length === 0) {
    out.message(options.stage ? `No keys for stage '${options.stage}'` : 'No keys defined');
  } else {
    out.write(result.output);
  }
  return { success: true, data: result };
}

/**
 * Setup the keys command
 */
export function setupKeysCommand(program: Command): void {
  program
    .command('keys')
    .description('List the keys of a configuration')
    .requiredOption('-f, --file <path>', 'configuration module')
    .addOption(
      new Option('--stage <stage>', 'only keys read at this stage').choices([STAGES.CONFIGURE, STAGES.RUN, STAGES.BOTH])
    )
    .action(withErrorHandling(async (options: KeysCommandOptions) => {
      await runKeysCommand(options);
    }));
}
