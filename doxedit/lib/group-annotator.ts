/**
 * Group-File Annotator
 *
 * Walks the member table of a package or package-group page line by line and
 * marks each listed entity that is deprecated or private:
 *
 *   <a class="el" href="group__bdlt__dateutil.html">Component bdlt_dateutil</a>
 *     → <a ...><span style="color:gray;">Component bdlt_dateutil<strong>: DEPRECATED</strong></span></a>
 *
 * and greys out the description row that follows it. Everything outside the
 * `memberdecls` table, and every line that is neither a member nor a
 * description row, is copied through unchanged; the output always has as many
 * lines as the input.
 *
 * State is two values: whether we are inside the table, and the attributes of
 * the most recent member row, which the description row after it consumes.
 */

import { FileAccessError, NotAnEntityError, UnexpectedSyntaxError } from './errors.ts';
import type { EntityAttributeResolver, EntityAttributes } from './entity-attributes.ts';
import { htmlPath, joinLines, listFiles, readTextFile, splitLines, writeTextFile } from './file-utils.ts';
import { levelOfAggregation, type AggregationLevel } from './nomenclature.ts';
import type { Logger } from './output.ts';
import { markupToReadable } from './title-classifier.ts';

export type ScanMode = 'Outside' | 'InMemberTable';

export interface ScanState {
  mode: ScanMode;
  /** Attributes of the last member row, consumed by the description row after it */
  carried: EntityAttributes;
}

export interface MemberRow {
  line: string;
  targetFile: string;
  label: string;
  tokens: string[];
}

const MEMBER_TABLE_OPEN = '<table class="memberdecls">';
const MEMBER_TABLE_CLOSE = '</table>';
const MEMBER_LINE = /^<tr><td class="memItemLeft"/;
const DESCRIPTION_LINE = /^<p><tr><td class="mdescLeft"/;

const EXPECTED_KIND_WORDS = ['Package', 'Component'];

export function initialScanState(): ScanState {
  return { mode: 'Outside', carried: { isDeprecated: false, isPrivate: false } };
}

export function parseMemberRow(line: string): MemberRow {
  const targetFile = line.replace(/.*href="/, '').replace(/">.*/, '');
  const label = line.replace(/.*\.html">/, '').replace(/<\/a>.*/, '');
  const tokens = label.split(/\s+/).filter(token => token !== '');
  return { line, targetFile, label, tokens };
}

/**
 * Bare entity name from a row label such as `Component bdlt_date`.
 *
 * A one-token label is a synthetic entry the generator makes up when an
 * entity has no documentation source of its own. It may carry a leading
 * capital, so the token is lower-cased and used as-is. This is a known
 * workaround, not a general recovery rule.
 */
export function entityNameOf(row: MemberRow, logger: Logger): string {
  const { tokens, label } = row;

  if (tokens.length === 2) {
    if (!EXPECTED_KIND_WORDS.includes(tokens[0])) {
      logger.warn(`unexpected form: ${tokens[0]}`);
    }
    return tokens[1];
  }

  if (tokens.length === 1) {
    const entity = tokens[0].toLowerCase();
    logger.warn(`unexpected form: ${label}`);
    logger.warn(`assuming synthetic entity: ${entity}`);
    return entity;
  }

  throw new UnexpectedSyntaxError(`totally unexpected syntax: ${label}`);
}

export function decorateMemberLine(line: string, attributes: EntityAttributes): string {
  let result = line;
  if (attributes.isDeprecated) {
    result = result.replace('</a>', '<strong>: DEPRECATED</strong></a>');
  }
  if (attributes.isPrivate) {
    result = result.replace('</a>', '<strong>: PRIVATE</strong></a>');
  }
  if (attributes.isDeprecated || attributes.isPrivate) {
    result = result
      .replace('.html">', '.html"><span style="color:gray;">')
      .replace('</a>', '</span></a>');
  }
  return result;
}

export function decorateDescriptionLine(line: string, carried: EntityAttributes): string {
  let result = line.replace(
    '<td class="mdescRight"><p>',
    '<td class="mdescRight"><p style="margin-top: 0; margin-bottom: 0;">',
  );
  if (carried.isDeprecated || carried.isPrivate) {
    result = result.replace('<p style="', '<p style="color: gray;');
  }
  return result;
}

function resolveAttributes(
  row: MemberRow,
  previous: EntityAttributes,
  resolver: EntityAttributeResolver,
  logger: Logger,
): EntityAttributes {
  const isDeprecated = resolver.isDeprecated(row.targetFile);
  const entity = entityNameOf(row, logger);
  logger.debug(`entity: ${entity}`);

  let isPrivate = previous.isPrivate;
  try {
    isPrivate = resolver.isPrivate(entity);
  } catch (err) {
    if (!(err instanceof NotAnEntityError)) throw err;
    logger.debug(`privacy unchanged for non-component: ${entity}`);
  }

  return { isDeprecated, isPrivate };
}

/**
 * Advance the scan by one line. Returns the (possibly rewritten) line and
 * the state for the next one.
 */
export function scanLine(
  line: string,
  state: ScanState,
  resolver: EntityAttributeResolver,
  logger: Logger,
): { line: string; state: ScanState } {
  let { mode, carried } = state;
  let output = line;

  if (line === MEMBER_TABLE_OPEN) mode = 'InMemberTable';

  if (mode === 'InMemberTable') {
    if (MEMBER_LINE.test(line)) {
      carried = resolveAttributes(parseMemberRow(line), carried, resolver, logger);
      output = decorateMemberLine(line, carried);
      logger.debug(`${carried.isDeprecated}, ${carried.isPrivate}: ${output}`);
    } else if (DESCRIPTION_LINE.test(line)) {
      output = decorateDescriptionLine(line, carried);
    }
  }

  if (line === MEMBER_TABLE_CLOSE) mode = 'Outside';

  return { line: output, state: { mode, carried } };
}

export function annotateGroupLines(
  lines: string[],
  resolver: EntityAttributeResolver,
  logger: Logger,
): string[] {
  let state = initialScanState();
  const output: string[] = [];
  for (const line of lines) {
    logger.debug(`${state.mode}: ${line}`, 2);
    const step = scanLine(line, state, resolver, logger);
    output.push(step.line);
    state = step.state;
  }
  return output;
}

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

export function isAnnotatableGroupFile(filename: string): boolean {
  return filename.startsWith('group__') && filename.endsWith('.html');
}

/**
 * Level of the entity a group page documents: `group__bdlt.html` → Package.
 */
export function groupFileLevel(filename: string): AggregationLevel {
  const item = markupToReadable(filename.replace(/^group__/, '').replace(/\.html$/, ''));
  return levelOfAggregation(item);
}

/**
 * Annotate one group page in place. Returns false (after a warning) if the
 * page cannot be read; a failed write throws.
 */
export function annotateGroupFile(
  htmlDir: string,
  filename: string,
  resolver: EntityAttributeResolver,
  logger: Logger,
): boolean {
  const path = htmlPath(htmlDir, filename);
  logger.verbose(`annotating ${path}`);

  let content: string;
  try {
    content = readTextFile(path);
  } catch (err) {
    if (!(err instanceof FileAccessError)) throw err;
    logger.warn(`annotateGroupFile: SKIP: ${err.message}`);
    return false;
  }

  const lines = annotateGroupLines(splitLines(content), resolver, logger);
  writeTextFile(path, joinLines(lines));
  return true;
}

export interface GroupAnnotationResult {
  annotated: string[];
  skipped: string[];
}

/**
 * Annotate every package and package-group page in `htmlDir`. Component
 * pages are left alone; they list classes, not entities.
 */
export function annotateGroupFiles(
  htmlDir: string,
  resolver: EntityAttributeResolver,
  logger: Logger,
): GroupAnnotationResult {
  const result: GroupAnnotationResult = { annotated: [], skipped: [] };

  for (const filename of listFiles(htmlDir, isAnnotatableGroupFile)) {
    const level = groupFileLevel(filename);
    if (level === 'Component') {
      logger.debug(`skipping component page: ${filename}`);
      continue;
    }
    if (annotateGroupFile(htmlDir, filename, resolver, logger)) {
      result.annotated.push(filename);
    } else {
      result.skipped.push(filename);
    }
  }

  return result;
}
