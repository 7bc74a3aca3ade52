/**
 * Deprecated-List Relabeling
 *
 * The generator files every deprecated entity in `deprecated.html` under a
 * "Group" heading. Replace that word with the entity's real level of
 * aggregation (Component, Package, Package Group).
 */

import { FileAccessError } from './errors.ts';
import { htmlPath, joinLines, readTextFile, splitLines, writeTextFile } from './file-utils.ts';
import { aggregationLabel } from './nomenclature.ts';
import type { Logger } from './output.ts';

export const DEPRECATED_LIST = 'deprecated.html';

export function relabelDeprecatedLine(line: string): string {
  if (!line.startsWith('<dt>Group ')) return line;
  const item = line.replace(/.*\.html">/, '').replace(/<\/a>.*/, '');
  return line.replace('Group', () => aggregationLabel(item));
}

/**
 * Returns false (after a warning) when the tree has no deprecated list.
 */
export function editDeprecatedList(htmlDir: string, logger: Logger): boolean {
  const path = htmlPath(htmlDir, DEPRECATED_LIST);
  logger.verbose(`relabeling ${path}`);

  let content: string;
  try {
    content = readTextFile(path);
  } catch (err) {
    if (!(err instanceof FileAccessError)) throw err;
    logger.warn(`editDeprecatedList: SKIP: ${err.message}`);
    return false;
  }

  writeTextFile(path, joinLines(splitLines(content).map(relabelDeprecatedLine)));
  return true;
}
