/**
 * Import Descriptors
 * The embedded leaf of an unresolved tree.
 */

// ============================================================
// TYPES
// ============================================================

/** `./`, `../`, `~/`, `/` */
export type FilePrefix = 'Here' | 'Parent' | 'Home' | 'Absolute';

export type ImportLocation =
  | {
      readonly type: 'Local';
      readonly prefix: FilePrefix;
      /** Path components after the prefix, the file name last */
      readonly path: readonly string[];
    }
  | { readonly type: 'Remote'; readonly url: string }
  | { readonly type: 'Env'; readonly name: string }
  | { readonly type: 'Missing' };

/** `Code` is the default; `as Text` gives `RawText` */
export type ImportMode = 'Code' | 'RawText';

export interface ImportHash {
  readonly algorithm: 'sha256';
  /** Lowercase hex, 64 digits */
  readonly digest: string;
}

export interface Import {
  readonly mode: ImportMode;
  readonly location: ImportLocation;
  readonly hash?: ImportHash | undefined;
}

// ============================================================
// RENDERING
// ============================================================

const PREFIXES: Record<FilePrefix, string> = {
  Here: '.',
  Parent: '..',
  Home: '~',
  Absolute: '',
};

export function renderLocation(location: ImportLocation): string {
  switch (location.type) {
    case 'Local':
      return `${PREFIXES[location.prefix]}/${location.path.join('/')}`;
    case 'Remote':
      return location.url;
    case 'Env':
      return `env:${location.name}`;
    case 'Missing':
      return 'missing';
  }
}

/** Surface form of an import, e.g. `../a.dhall sha256:… as Text` */
export function renderImport(value: Import): string {
  let result = renderLocation(value.location);
  if (value.hash) {
    result += ` ${value.hash.algorithm}:${value.hash.digest}`;
  }
  if (value.mode === 'RawText') {
    result += ' as Text';
  }
  return result;
}
