import type { Stage } from '../../types/index.js';
import { graphKeys } from '../graph/graph.js';
import { matchesStage, type AnyKey } from '../keys/key.js';
import { emitKey } from '../keys/key-output.js';
import { buildGraph, type ConfigDefinition } from '../session.js';

export interface ListKeysOptions {
  stage?: Stage;
}

export interface ListKeysResult {
  keys: AnyKey[];
  /** Help text grouped by section; empty when there are no keys */
  output: string;
}

function indent(text: string): string {
  return text
    .split('\n')
    .map(line => `  ${line}`)
    .join('\n');
}

/**
 * Document the keys of `definition`'s graph that belong to `stage`, grouped
 * by help section. Sections and keys are in name order.
 */
export function listKeys(definition: ConfigDefinition, options: ListKeysOptions = {}): ListKeysResult {
  const { graph } = buildGraph(definition);
  const keys = graphKeys(graph).filter(key => matchesStage(key, options.stage)).toArray();

  const sections = new Map<string, AnyKey[]>();
  for (const key of keys) {
    const section = sections.get(key.doc.section) ?? [];
    section.push(key);
    sections.set(key.doc.section, section);
  }

  const blocks = [...sections.keys()].sort().map(section => {
    const entries = (sections.get(section) ?? []).map(key => indent(emitKey(key)));
    return [section, ...entries].join('\n');
  });
  return { keys, output: blocks.length > 0 ? `${blocks.join('\n\n')}\n` : '' };
}
