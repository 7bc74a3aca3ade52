/**
 * Entity Attribute Resolver
 *
 * Answers two questions about an entity listed in a group page:
 * - is it deprecated? (its own rendered page carries the deprecation notice)
 * - is it private?    (its name has more than one segment after the package)
 *
 * Both are read-only queries against the tree as it is on disk; nothing is
 * cached, so the answer for a name is whatever the file says when asked.
 */

import { NotAnEntityError } from './errors.ts';
import { htmlPath, readTextFile } from './file-utils.ts';
import { getComponentPackage, isComponent } from './nomenclature.ts';

export interface EntityAttributes {
  isDeprecated: boolean;
  isPrivate: boolean;
}

export interface EntityAttributeResolver {
  /** `filename` is the entity's rendered page, relative to the HTML directory */
  isDeprecated(filename: string): boolean;
  /** Throws NotAnEntityError if `name` is not a component */
  isPrivate(name: string): boolean;
}

// Emitted by the generator at the top of a deprecated entity's page.
const DEPRECATION_MARKER =
  /<dl class="deprecated"><dt><b><a class="el" href="deprecated\.html#_deprecated.*">Deprecated:<\/a>/;

// Components of the forwarding namespace are private only if they are build
// targets.
const FORWARDING_PREFIX = 'bslfwd_';
const FORWARDING_PRIVATE_SUFFIX = 'buildtarget';

export function hasDeprecationMarker(content: string): boolean {
  return DEPRECATION_MARKER.test(content);
}

export function isPrivateComponent(name: string): boolean {
  const pkg = getComponentPackage(name);
  if (!isComponent(name) || pkg === null) {
    throw new NotAnEntityError(name);
  }

  if (name.startsWith(FORWARDING_PREFIX)) {
    return name.slice(FORWARDING_PREFIX.length).endsWith(FORWARDING_PRIVATE_SUFFIX);
  }

  const stem = name.slice(pkg.length + 1);
  return stem.split('_').filter(segment => segment !== '').length > 1;
}

/**
 * Resolver over a directory of generated pages. A missing page throws
 * FileAccessError: the name came from a cross-reference the generator wrote,
 * so the page must exist.
 */
export class DiskEntityResolver implements EntityAttributeResolver {
  private htmlDir: string;

  constructor(htmlDir: string) {
    this.htmlDir = htmlDir;
  }

  isDeprecated(filename: string): boolean {
    return hasDeprecationMarker(readTextFile(htmlPath(this.htmlDir, filename)));
  }

  isPrivate(name: string): boolean {
    return isPrivateComponent(name);
  }
}
