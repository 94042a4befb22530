import type { OutputPort } from '../core/ports/output.js';
import { writeTextFile } from '../utils/fs.js';

/**
 * Write command output to `path` when given, otherwise through the port.
 */
export async function emitText(text: string, path: string | undefined, out: OutputPort): Promise<void> {
  if (path === undefined) {
    out.write(text);
    return;
  }
  await writeTextFile(path, text);
  out.success(`Wrote ${path}`);
}
