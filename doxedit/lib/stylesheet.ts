/**
 * Stylesheet Edit
 *
 * Comments out the border declarations of the generator's `doxtable` cell
 * rule so house tables render without grid lines. The untouched stylesheet is
 * kept beside the edited one as `doxygen_ORIG.css`.
 */

import { FileAccessError } from './errors.ts';
import { htmlPath, readTextFile, renameFile, writeTextFile } from './file-utils.ts';
import type { Logger } from './output.ts';

export const STYLESHEET = 'doxygen.css';
export const ORIGINAL_STYLESHEET = 'doxygen_ORIG.css';

const RULE_OPEN = 'table.doxtable td, table.doxtable th {';
const RULE_CLOSE = '}';

function commentOutBorder(line: string): string {
  if (!line.includes('border') || line.includes('/* border')) return line;
  return `${line.replace('border', '/* border')} */`;
}

/**
 * Comment out every line mentioning `border` between the rule's opening line
 * and the next line that is exactly `}`.
 */
export function editStylesheetContent(css: string): string {
  let inRule = false;
  return css
    .split('\n')
    .map(line => {
      if (!inRule) {
        if (line !== RULE_OPEN) return line;
        inRule = true;
        return commentOutBorder(line);
      }
      if (line === RULE_CLOSE) inRule = false;
      return commentOutBorder(line);
    })
    .join('\n');
}

/**
 * Returns false (after a warning) when there is no stylesheet to edit.
 */
export function editStylesheet(htmlDir: string, logger: Logger): boolean {
  const current = htmlPath(htmlDir, STYLESHEET);
  const original = htmlPath(htmlDir, ORIGINAL_STYLESHEET);
  logger.verbose(`editing '${STYLESHEET}' file in ${htmlDir}`);

  let css: string;
  try {
    css = readTextFile(current);
  } catch (err) {
    if (!(err instanceof FileAccessError)) throw err;
    logger.warn(`editStylesheet: SKIP: ${err.message}`);
    return false;
  }

  renameFile(current, original);
  writeTextFile(current, editStylesheetContent(css));
  return true;
}
