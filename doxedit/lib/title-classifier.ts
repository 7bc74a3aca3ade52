/**
 * Filename → Title Classification
 *
 * The generator names every page after the entity it documents, encoding
 * `_` as `__` and `::` as `_1_1` (e.g. `classbsl_1_1Vector-members.html`).
 * This module recovers the entity kind and a readable page title from that
 * name.
 *
 * The shapes overlap (`class*-members` is also `class*`), so the dispatch is
 * an ordered table evaluated first-match-wins.
 */

import { FormatError } from './errors.ts';
import { aggregationLabel } from './nomenclature.ts';

export type EntityKind =
  | 'ClassMembers'
  | 'Class'
  | 'Group'
  | 'HeaderSource'
  | 'HeaderReference'
  | 'StructMembers'
  | 'Struct'
  | 'Namespace'
  | 'Index'
  | 'UnionMembers'
  | 'Union'
  | 'Unrecognized';

export interface Classification {
  kind: EntityKind;
  /** Empty when the kind is Unrecognized */
  title: string;
}

interface TitleRule {
  kind: Exclude<EntityKind, 'Unrecognized'>;
  matches: RegExp;
  title: (stem: string) => string;
}

/**
 * Undo the generator's filename encoding: `__` → `_`, then `_1` → `:`.
 * The order matters; `bsl_1_1Vector` becomes `bsl::Vector`.
 */
export function markupToReadable(markup: string): string {
  return markup.replace(/__/g, '_').replace(/_1/g, ':');
}

function strip(stem: string, ...patterns: RegExp[]): string {
  return patterns.reduce((s, pattern) => s.replace(pattern, ''), stem);
}

const TITLE_RULES: TitleRule[] = [
  {
    kind: 'ClassMembers',
    matches: /^class.*-members$/,
    title: (stem) => `Class ${markupToReadable(strip(stem, /^class/, /-members$/))} Members`,
  },
  {
    kind: 'Class',
    matches: /^class/,
    title: (stem) => `Class ${markupToReadable(strip(stem, /^class/))}`,
  },
  {
    kind: 'Group',
    matches: /^group/,
    title: (stem) => {
      const name = markupToReadable(strip(stem, /^group__/));
      return `${name} ${aggregationLabel(name)}`;
    },
  },
  {
    kind: 'HeaderSource',
    matches: /_8h_source$/,
    title: (stem) => `${markupToReadable(stem.replace(/_8h_source$/, '.h'))} Source`,
  },
  {
    kind: 'HeaderReference',
    matches: /_8h$/,
    title: (stem) => `${markupToReadable(stem.replace(/_8h$/, '.h'))} Reference`,
  },
  {
    kind: 'StructMembers',
    matches: /^struct.*-members$/,
    title: (stem) => `Struct ${markupToReadable(strip(stem, /^struct/, /-members$/))} Members`,
  },
  {
    kind: 'Struct',
    matches: /^struct/,
    title: (stem) => `Struct ${markupToReadable(strip(stem, /^struct/))}`,
  },
  {
    kind: 'Namespace',
    matches: /^namespace/,
    title: (stem) => `Namespace ${markupToReadable(strip(stem, /^namespace/))}`,
  },
  {
    kind: 'Index',
    matches: /^index/,
    title: (stem) => {
      const name = markupToReadable(strip(stem, /^index_/));
      return `Index of ${name} ${aggregationLabel(name)}`;
    },
  },
  {
    kind: 'UnionMembers',
    matches: /^union.*-members$/,
    title: (stem) => `Union ${markupToReadable(strip(stem, /^union/, /-members$/))} Members`,
  },
  {
    kind: 'Union',
    matches: /^union/,
    title: (stem) => `Union ${markupToReadable(strip(stem, /^union/))}`,
  },
];

/**
 * Classify a generated page by its filename (no directory part).
 * Throws FormatError if the name does not end in `.html`.
 */
export function classifyFilename(filename: string): Classification {
  if (!filename.endsWith('.html')) {
    throw new FormatError(`bad filename: ${filename}`);
  }
  const stem = filename.slice(0, -'.html'.length);

  const rule = TITLE_RULES.find(r => r.matches.test(stem));
  if (!rule) return { kind: 'Unrecognized', title: '' };

  return { kind: rule.kind, title: rule.title(stem) };
}

export function filenameToTitle(filename: string): string {
  return classifyFilename(filename).title;
}
