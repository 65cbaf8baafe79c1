/**
 * Import Roots
 * Where relative imports are resolved from, and how a location becomes a
 * file path.
 */

import * as os from 'node:os';
import * as path from 'node:path';
import { ImportError } from '../error-classes.js';
import { renderLocation, type ImportLocation } from '../syntax/import.js';

/** Directory that `./` and `../` are relative to */
export interface ImportRoot {
  readonly type: 'LocalDir';
  readonly directory: string;
}

export function localDir(directory: string): ImportRoot {
  return { type: 'LocalDir', directory: path.resolve(directory) };
}

export interface LocateOptions {
  /** Directory for `~/` imports; the OS home directory when unset */
  readonly homeDirectory?: string | undefined;
}

/**
 * Absolute, normalised file path for a location.
 *
 * @throws {ImportError} DHALL-I005 for `missing`
 * @throws {ImportError} DHALL-I002 for remote and environment imports
 */
export function locateImport(
  location: ImportLocation,
  root: ImportRoot,
  options: LocateOptions = {}
): string {
  if (location.type === 'Missing') {
    throw new ImportError('DHALL-I005', {});
  }
  if (location.type !== 'Local') {
    throw new ImportError('DHALL-I002', {
      location: renderLocation(location),
    });
  }

  const components = location.path;
  switch (location.prefix) {
    case 'Here':
      return path.resolve(root.directory, ...components);
    case 'Parent':
      return path.resolve(path.dirname(root.directory), ...components);
    case 'Home':
      return path.resolve(options.homeDirectory ?? os.homedir(), ...components);
    case 'Absolute':
      return path.resolve(path.parse(root.directory).root, ...components);
  }
}
