/**
 * Markup Text Editor
 *
 * Whole-file rewrites applied to every generated HTML page. Each step is a
 * plain regex substitution over well-known generator idioms; nothing here
 * parses HTML. Steps run in a fixed order from editHtmlContent, but each one
 * is exported so it can be exercised on its own.
 */

import { FileAccessError } from './errors.ts';
import { isPackageGroupName } from './nomenclature.ts';
import type { Logger } from './output.ts';
import { filenameToTitle } from './title-classifier.ts';

export interface EditOptions {
  /** Prefix for every page title; empty disables title injection */
  baseTitle: string;
  /** The main page lives elsewhere, so `main.html` links stay as they are */
  userMainPage: boolean;
  /** Read another page of the same tree by filename */
  readSibling: (filename: string) => string;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Titles, navigation and terminology
// ---------------------------------------------------------------------------

export function injectTitle(content: string, filename: string, baseTitle: string): string {
  const title = filenameToTitle(filename);
  const full = title ? `${baseTitle}: ${title}` : baseTitle;
  return content.replace(/<title>[\s\S]*<\/title>/g, () => `<title>${full}</title>`);
}

/**
 * Drop the Main/Alpha/Namespace entries (and their `|` separator) from the
 * quick-index bar.
 */
export function removeQuickIndexLinks(content: string): string {
  return content.replace(/<a class="qindex[^>]+>(Main|Alpha|Namespace)[\s\S]*?<\/a>\s+\|/g, '');
}

/** "module" is not a house term; the generator's modules are components. */
export function renameModuleTerminology(content: string): string {
  return content
    .replace(/\bModule(s?)\b/g, 'Component$1')
    .replace(/\bmodule(s?)\b/g, 'component$1');
}

export function retargetMainPage(content: string): string {
  return content.replace(/\bmain\.html\b/g, 'components.html');
}

// Inserted by the pre-processor so the generator leaves these sequences alone.
export const OBSCURED_COLON_COLON =
  'PER_DRQS-27494910_OBSCURE_COLON-COLON_HERE_THEN_RESTORE_IN_POST-PROCESSING';
export const OBSCURED_ASTERISK_SLASH =
  'PER_DRQS-28777305_OBSCURE_ASTERISK-SLASH_HERE_THEN_RESTORE_IN_POST-PROCESSING';

export function restorePlaceholders(content: string): string {
  return content
    .split(OBSCURED_COLON_COLON).join('::')
    .split(OBSCURED_ASTERISK_SLASH).join('*/');
}

// ---------------------------------------------------------------------------
// Class pages: link back to the component-level documentation
// ---------------------------------------------------------------------------

export const ATTRIBUTE_LINK_MARKER =
  'See the Attributes section under @DESCRIPTION in the component-level documentation.';

const GLOSSARY_COMPONENT = 'bsldoc_glossary';
const GLOSSARY_LINK = '<A href="group__bsldoc__glossary.html">bsldoc_glossary</A>';

export function isClassFile(filename: string): boolean {
  return filename.endsWith('.html')
    && filename.startsWith('class')
    && !filename.endsWith('-members.html');
}

export function needsAttributeLink(content: string): boolean {
  return content.includes(ATTRIBUTE_LINK_MARKER);
}

/**
 * Component page documenting a class: `classbdlt_1_1Date.html` →
 * `group__bdlt__date.html`.
 */
export function descriptionFileFor(classFilename: string): string {
  return classFilename
    .replace(/^class/, 'group__')
    .replace(/_1_1/g, '__')
    .toLowerCase();
}

export function extractDescriptionAnchor(content: string): string | null {
  const match = content.match(/\n<a href="#([^"]+)">Description <\/a> <ul>\n/);
  return match ? match[1] : null;
}

export function extractAttributesAnchor(content: string): string | null {
  const match = content.match(/\n<a href="#([^"]+)">Attributes <\/a> <\/li>\n/);
  return match ? match[1] : null;
}

function composeLink(descriptionFile: string, anchor: string | null, text: string): string {
  const href = anchor ? `${descriptionFile}#${anchor}` : descriptionFile;
  return `<A  href="${href}">${text}</A>`;
}

// Links this step wrote on an earlier pass; their text is left alone.
const INSERTED_LINK = /<A\s[^>]*>[\s\S]*?<\/A>/.source;

function replaceOutsideInsertedLinks(content: string, token: string, replacement: string): string {
  return content.replace(
    new RegExp(`${INSERTED_LINK}|${token}`, 'g'),
    match => (match.startsWith('<A') ? match : replacement),
  );
}

/**
 * Turn the marker sentence, every `@DESCRIPTION` and every glossary mention
 * into links. A missing anchor still links to the component page itself.
 * Text already inside an `<A ...>` link is not wrapped again.
 */
export function addAttributeLinks(
  content: string,
  descriptionFile: string,
  descriptionContent: string,
): string {
  const linkedDescription = composeLink(
    descriptionFile, extractDescriptionAnchor(descriptionContent), '@DESCRIPTION');
  const linkedAttributes = composeLink(
    descriptionFile, extractAttributesAnchor(descriptionContent), 'Attributes');

  const withAttributes = content.replace(
    'See the Attributes section under', () => `See the ${linkedAttributes} section under`);
  const withDescription = replaceOutsideInsertedLinks(withAttributes, '@DESCRIPTION', linkedDescription);
  return replaceOutsideInsertedLinks(withDescription, GLOSSARY_COMPONENT, GLOSSARY_LINK);
}

// ---------------------------------------------------------------------------
// Group pages
// ---------------------------------------------------------------------------

export function isGroupFile(filename: string): boolean {
  return /^group__.*\.html$/.test(filename);
}

/**
 * Group page for a package or package group (as opposed to a component).
 */
export function isPackageGroupFile(filename: string): boolean {
  if (!isGroupFile(filename)) return false;
  const name = filename
    .replace(/^group__/, '')
    .replace(/\.html$/, '')
    .replace(/__/g, '_');
  return isPackageGroupName(name);
}

const COMPONENTS_NAV = '\n<a href="#groups">Components</a>  </div>\n';
const COMPONENTS_HEADER = '\nComponents</h2></td></tr>\n';

export function changeComponentToPackageLinks(content: string, logger: Logger): string {
  if (!content.includes(COMPONENTS_NAV)) {
    logger.verbose('changeComponentToPackageLinks: no match1');
  }
  if (!content.includes(COMPONENTS_HEADER)) {
    logger.verbose('changeComponentToPackageLinks: no match2');
  }
  return content
    .replace(COMPONENTS_NAV, '\n<a href="#groups">Packages</a>  </div>\n')
    .replace(COMPONENTS_HEADER, '\nPackages</h2></td></tr>\n');
}

export function removeBreaksFromTable(content: string): string {
  return content.replace(/\n<br\/><\/td><\/tr>\n/g, '\n</td></tr>\n');
}

// ---------------------------------------------------------------------------
// Escaped at-signs in code blocks
// ---------------------------------------------------------------------------

export function needsPreUnescape(filename: string): boolean {
  return filename.endsWith('.html') && !filename.endsWith('_source.html');
}

/**
 * Within `<pre` … `/pre>` line ranges (inclusive; one line may both open and
 * close a range), turn `\@` back into `@`. The result always ends in a single
 * newline.
 */
export function unescapeAtSignsInPre(content: string): string {
  const lines = content.split('\n');
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();

  let inPre = false;
  const edited = lines.map(line => {
    let active = inPre;
    if (!inPre && line.includes('<pre')) {
      active = true;
      inPre = !line.includes('/pre>');
    } else if (inPre && line.includes('/pre>')) {
      inPre = false;
    }
    return active ? line.replace(/\\@/g, '@') : line;
  });

  return edited.join('\n') + '\n';
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

function readDescription(descriptionFile: string, options: EditOptions): string {
  try {
    return options.readSibling(descriptionFile);
  } catch (err) {
    if (!(err instanceof FileAccessError)) throw err;
    options.logger.warn(err.message);
    return '';
  }
}

/**
 * Apply every rewrite that applies to `filename` and return the new content.
 */
export function editHtmlContent(content: string, filename: string, options: EditOptions): string {
  let result = content;

  if (options.baseTitle) {
    result = injectTitle(result, filename, options.baseTitle);
  }

  result = removeQuickIndexLinks(result);
  result = renameModuleTerminology(result);
  if (!options.userMainPage) {
    result = retargetMainPage(result);
  }
  result = restorePlaceholders(result);

  if (isClassFile(filename) && needsAttributeLink(result)) {
    const descriptionFile = descriptionFileFor(filename);
    result = addAttributeLinks(result, descriptionFile, readDescription(descriptionFile, options));
  }

  if (isPackageGroupFile(filename)) {
    result = changeComponentToPackageLinks(result, options.logger);
  }

  if (isGroupFile(filename)) {
    result = removeBreaksFromTable(result);
  }

  if (needsPreUnescape(filename)) {
    result = unescapeAtSignsInPre(result);
  }

  return result;
}
