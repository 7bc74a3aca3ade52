/**
 * File Utilities
 *
 * Directory listing and whole-file read/write for the generated HTML tree.
 * Every failure is rethrown as a FileAccessError naming the operation, so the
 * caller decides whether it is fatal (write, rename, list) or skippable (read).
 */

import { readdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { join } from 'path';
import { FileAccessError } from './errors.ts';

/**
 * List files in a directory (non-recursive) whose names pass the filter,
 * sorted by name so runs are reproducible. Symbolic links are listed; a link
 * that does not lead to a readable file fails later, at the read.
 */
export function listFiles(dir: string, filter: (name: string) => boolean): string[] {
  try {
    return readdirSync(dir, { withFileTypes: true })
      .filter(entry => (entry.isFile() || entry.isSymbolicLink()) && filter(entry.name))
      .map(entry => entry.name)
      .sort();
  } catch (err) {
    throw new FileAccessError('list', dir, err);
  }
}

export function readTextFile(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (err) {
    throw new FileAccessError('read', path, err);
  }
}

export function writeTextFile(path: string, content: string): void {
  try {
    writeFileSync(path, content, 'utf-8');
  } catch (err) {
    throw new FileAccessError('write', path, err);
  }
}

export function renameFile(from: string, to: string): void {
  try {
    renameSync(from, to);
  } catch (err) {
    throw new FileAccessError('rename', from, err);
  }
}

/**
 * Split file content into lines the way a line-oriented reader sees them:
 * the final newline terminates the last line rather than starting a new one.
 */
export function splitLines(content: string): string[] {
  if (content === '') return [];
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Inverse of splitLines: every line, including the last, ends in a newline.
 */
export function joinLines(lines: string[]): string {
  return lines.map(line => `${line}\n`).join('');
}

export function htmlPath(htmlDir: string, filename: string): string {
  return join(htmlDir, filename);
}
