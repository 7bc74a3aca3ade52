/**
 * Entity Nomenclature
 *
 * Lexical rules for the house source-organization convention: package groups
 * (three characters, e.g. `bsl`), packages (a group name plus a suffix, e.g.
 * `bslstl`) and components (`<package>_<name>`, e.g. `bslstl_vector`).
 *
 * Nothing here touches the filesystem; every answer comes from the shape of
 * the name alone.
 */

export type AggregationLevel = 'Component' | 'Package' | 'PackageGroup' | 'Unknown';

export const AGGREGATION_LABELS: Record<AggregationLevel, string> = {
  Component: 'Component',
  Package: 'Package',
  PackageGroup: 'Package Group',
  Unknown: '',
};

/**
 * Shape table for levelOfAggregation. Order is significant: the shapes
 * overlap (`a_bdema_foo` also matches the two-token rows) and the first match
 * wins. `\w` includes `_`.
 */
const AGGREGATION_SHAPES: ReadonlyArray<readonly [RegExp, AggregationLevel]> = [
  [/^\w_\w+_\w+/, 'Component'],
  [/^\w_\w+/, 'Package'],
  [/^\w+_\w+/, 'Component'],
  [/^\w{3}$/, 'PackageGroup'],
  [/^\w{3}\w+$/, 'Package'],
];

/**
 * Classify a readable entity name (underscores already un-doubled) by its
 * level of aggregation.
 */
export function levelOfAggregation(name: string): AggregationLevel {
  for (const [shape, level] of AGGREGATION_SHAPES) {
    if (shape.test(name)) return level;
  }
  return 'Unknown';
}

export function aggregationLabel(name: string): string {
  return AGGREGATION_LABELS[levelOfAggregation(name)];
}

// Optional one-letter prefix (`a_`, `z_`, ...), package, then one or more
// lower-case segments.
const COMPONENT_PATTERN = /^((?:[a-z]_)?[a-z][a-z0-9]+)_([a-z0-9]+(?:_[a-z0-9]+)*)$/;

const PACKAGE_GROUP_PATTERN = /^(z_)?([el]_)?[a-z][a-z0-9]{2}$/;

export function isComponent(name: string): boolean {
  return COMPONENT_PATTERN.test(name);
}

/**
 * Package that owns a component: `bslstl_vector` → `bslstl`,
 * `a_bdema_pool` → `a_bdema`. Returns null for non-components.
 */
export function getComponentPackage(component: string): string | null {
  const match = component.match(COMPONENT_PATTERN);
  return match ? match[1] : null;
}

export function isPackageGroupName(name: string): boolean {
  return PACKAGE_GROUP_PATTERN.test(name);
}
