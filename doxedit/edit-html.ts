#!/usr/bin/env node
/**
 * Generated-HTML Post-Processor
 *
 * Rewrites a tree of generated API documentation in place: page titles,
 * house terminology, quick-index cleanup, class-to-component cross links,
 * the stylesheet, the deprecated list, and deprecated/private badges on
 * package and package-group pages.
 *
 * Run via: npm run edit-html -- [options]
 *
 * Options:
 *   --help | -h | -?           Print usage and exit
 *   --debug | -d               Debug reporting (repeat for more)
 *   --verbose | -v             Verbose reporting (repeat for more)
 *   --userMainPage | -m        Keep links to main.html as they are
 *   --htmlDir | -o <dir>       Directory of generated files (default: html)
 *   --baseTitle | -b <title>   Title prefix (default: "API Documentation"; "" disables)
 *   --ci                       Plain output without colors
 *
 * Environment (.env is loaded first; the command line wins):
 *   DOXEDIT_HTML_DIR, DOXEDIT_BASE_TITLE, DOXEDIT_DEBUG, DOXEDIT_VERBOSE
 */

import dotenv from 'dotenv';
import { basename } from 'path';
import { fileURLToPath } from 'url';
import { formatUsage } from './lib/cli.ts';
import { loadRunConfig, type RunConfig } from './lib/config.ts';
import { editDeprecatedList } from './lib/deprecated-list.ts';
import { DiskEntityResolver } from './lib/entity-attributes.ts';
import { DoxeditError, FileAccessError, UsageError } from './lib/errors.ts';
import { htmlPath, listFiles, readTextFile, writeTextFile } from './lib/file-utils.ts';
import { annotateGroupFiles } from './lib/group-annotator.ts';
import { editHtmlContent } from './lib/markup-editor.ts';
import { createLogger, formatCount, type Logger } from './lib/output.ts';
import { editStylesheet } from './lib/stylesheet.ts';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface RunSummary {
  htmlFilesEdited: string[];
  htmlFilesSkipped: string[];
  stylesheetEdited: boolean;
  deprecatedListEdited: boolean;
  groupFilesAnnotated: string[];
  groupFilesSkipped: string[];
}

// ─── HTML pass ──────────────────────────────────────────────────────────────

/** Pages the editor rewrites; `*ORIG.html` copies are kept as they are. */
export function isEditableHtmlFile(filename: string): boolean {
  return filename.endsWith('.html') && !filename.endsWith('ORIG.html');
}

export function editHtmlFiles(
  config: Pick<RunConfig, 'htmlDir' | 'baseTitle' | 'userMainPage'>,
  logger: Logger,
): { edited: string[]; skipped: string[] } {
  const { htmlDir } = config;
  const edited: string[] = [];
  const skipped: string[] = [];

  for (const filename of listFiles(htmlDir, isEditableHtmlFile)) {
    const path = htmlPath(htmlDir, filename);
    logger.verbose(`PROC file: ${path}`);

    let content: string;
    try {
      content = readTextFile(path);
    } catch (err) {
      if (!(err instanceof FileAccessError)) throw err;
      logger.warn(`editHtmlFile: SKIP: ${err.message}`);
      skipped.push(filename);
      continue;
    }

    const result = editHtmlContent(content, filename, {
      baseTitle: config.baseTitle,
      userMainPage: config.userMainPage,
      readSibling: name => readTextFile(htmlPath(htmlDir, name)),
      logger,
    });
    writeTextFile(path, result);
    edited.push(filename);
  }

  return { edited, skipped };
}

// ─── Run ────────────────────────────────────────────────────────────────────

/**
 * Edit the whole tree. Throws FileAccessError when the directory cannot be
 * listed or a page cannot be written; unreadable pages are skipped.
 */
export function runEditHtml(config: RunConfig, logger: Logger): RunSummary {
  logger.debug(`htmlDir: ${config.htmlDir}`);
  logger.debug(`baseTitle: ${config.baseTitle}`);

  const html = editHtmlFiles(config, logger);
  const stylesheetEdited = editStylesheet(config.htmlDir, logger);
  const deprecatedListEdited = editDeprecatedList(config.htmlDir, logger);
  const groups = annotateGroupFiles(config.htmlDir, new DiskEntityResolver(config.htmlDir), logger);

  return {
    htmlFilesEdited: html.edited,
    htmlFilesSkipped: html.skipped,
    stylesheetEdited,
    deprecatedListEdited,
    groupFilesAnnotated: groups.annotated,
    groupFilesSkipped: groups.skipped,
  };
}

function printSummary(summary: RunSummary, logger: Logger): void {
  logger.success(`Edited ${formatCount(summary.htmlFilesEdited.length, 'page')}`);
  logger.log(`  Annotated ${formatCount(summary.groupFilesAnnotated.length, 'group page')}`);
  const skipped = summary.htmlFilesSkipped.length + summary.groupFilesSkipped.length;
  if (skipped > 0) {
    logger.warn(`Skipped ${formatCount(skipped, 'unreadable page')}`);
  }
}

/**
 * Returns the process exit code.
 */
export function main(argv: string[], env: Record<string, string | undefined> = process.env): number {
  const prog = basename(process.argv[1] ?? 'edit-html');

  let config: RunConfig;
  try {
    config = loadRunConfig(argv, env);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(`!! ${err.message}`);
    console.error(formatUsage(prog));
    return 1;
  }

  if (config.help) {
    console.error(formatUsage(prog));
    return 0;
  }

  const logger = createLogger({
    verboseLevel: config.verboseLevel,
    debugLevel: config.debugLevel,
    ciMode: config.ciMode,
  });
  logger.info(`Editing ${config.htmlDir}`);

  try {
    printSummary(runEditHtml(config, logger), logger);
    return 0;
  } catch (err) {
    if (!(err instanceof DoxeditError)) throw err;
    logger.error(err.message);
    return 1;
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  dotenv.config();
  let code: number;
  try {
    code = main(process.argv.slice(2));
  } catch (err) {
    console.error(err);
    code = 1;
  }
  process.exit(code);
}
