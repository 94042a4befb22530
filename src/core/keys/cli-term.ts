/**
 * Command-line surface of keys.
 *
 * Reading a key from arguments is a pure step that returns what was found;
 * binding the result into an `EvalContext` is left to the caller
 * (`applyTermResult`).
 */

import { Command, CommanderError, Option } from 'commander';
import type { Stage } from '../../types/index.js';
import { ParseFailureError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { toOption } from './doc.js';
import type { EvalContext } from './eval-context.js';
import { matchesStage, type AnyKey, type Key } from './key.js';
import type { KeySet } from './key-set.js';

export type KeyReadResult<T> =
  | { status: 'set'; value: T; raw: string }
  | { status: 'unset' }
  | { status: 'failed'; error: ParseFailureError };

export interface KeyArgument<T> {
  readonly key: Key<T>;
  /** A fresh commander option for this key */
  option(): Option;
  /** Interpret the value commander stored for the option. */
  read(raw: unknown): KeyReadResult<T>;
  parse(argv: readonly string[]): KeyReadResult<T>;
}

export interface KeyBinding {
  key: AnyKey;
  value: unknown;
  raw: string;
}

export interface TermResult {
  bindings: KeyBinding[];
  failures: ParseFailureError[];
}

export interface KeyTerm {
  readonly stage?: Stage;
  readonly keys: KeySet;
  options(): Option[];
  attach(command: Command): Command;
  /** Interpret an already-parsed `command.opts()` record. */
  read(values: Record<string, unknown>): TermResult;
  parse(argv: readonly string[]): TermResult;
}

/**
 * Parse `argv` against `options` only, ignoring anything else it contains.
 */
function parseOptionValues(options: Option[], argv: readonly string[]): Record<string, unknown> {
  const command = new Command()
    .allowUnknownOption(true)
    .allowExcessArguments(true)
    .helpOption(false)
    .exitOverride()
    .configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
  for (const option of options) {
    command.addOption(option);
  }
  try {
    command.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new ValidationError(error.message.replace(/^error: /, ''), { code: error.code });
    }
    throw error;
  }
  return command.opts();
}

export function termKey<T>(key: Key<T>): KeyArgument<T> {
  const read = (raw: unknown): KeyReadResult<T> => {
    if (raw === undefined) {
      return { status: 'unset' };
    }
    if (typeof raw !== 'string') {
      return { status: 'failed', error: new ParseFailureError(key.name, String(raw), 'expected a value') };
    }
    const parsed = key.descriptor.parse(raw);
    if (!parsed.ok) {
      return { status: 'failed', error: new ParseFailureError(key.name, raw, parsed.error) };
    }
    return { status: 'set', value: parsed.value, raw };
  };

  return {
    key,
    option: () => toOption(key.doc),
    read,
    parse(argv: readonly string[]): KeyReadResult<T> {
      const option = toOption(key.doc);
      const values = parseOptionValues([option], argv);
      return read(values[option.attributeName()]);
    }
  };
}

/**
 * One argument surface for the keys of `keys` whose stage matches `stage`.
 */
export function term(stage: Stage | undefined, keys: KeySet): KeyTerm {
  const selected = keys.filter(key => matchesStage(key, stage));
  const args = selected.toArray().map(key => termKey(key));

  const readAll = (values: Record<string, unknown>, options: Option[]): TermResult => {
    const result: TermResult = { bindings: [], failures: [] };
    args.forEach((arg, index) => {
      const option = options[index];
      if (!option) return;
      const outcome = arg.read(values[option.attributeName()]);
      switch (outcome.status) {
        case 'set':
          result.bindings.push({ key: arg.key, value: outcome.value, raw: outcome.raw });
          break;
        case 'failed':
          logger.debug(outcome.error.message);
          result.failures.push(outcome.error);
          break;
        case 'unset':
          break;
      }
    });
    return result;
  };

  const options = (): Option[] => args.map(arg => arg.option());

  return {
    stage,
    keys: selected,
    options,
    attach(command: Command): Command {
      for (const option of options()) {
        command.addOption(option);
      }
      return command;
    },
    read(values: Record<string, unknown>): TermResult {
      return readAll(values, options());
    },
    parse(argv: readonly string[]): TermResult {
      const opts = options();
      return readAll(parseOptionValues(opts, argv), opts);
    }
  };
}

/**
 * Bind every value of `result` into `ctx` as command-line input.
 */
export function applyTermResult(ctx: EvalContext, result: TermResult): void {
  for (const binding of result.bindings) {
    ctx.bind(binding.key, binding.value, 'cli');
  }
}
