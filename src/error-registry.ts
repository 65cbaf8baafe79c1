/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'parse' | 'internal' | 'syntax' | 'import' | 'config';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: DHALL-{category}{3-digit} (e.g., DHALL-I003) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Parse Errors (DHALL-P0xx)
  {
    errorId: 'DHALL-P001',
    category: 'parse',
    description: 'Syntax error',
    messageTemplate: 'Syntax error: expected {expected}',
  },
  {
    errorId: 'DHALL-P002',
    category: 'parse',
    description: 'Invalid numeric literal',
    messageTemplate: 'Invalid {kind} literal: {text}',
  },
  {
    errorId: 'DHALL-P003',
    category: 'parse',
    description: 'Invalid integrity hash',
    messageTemplate: 'Invalid integrity hash: {hash}',
  },

  // Internal Errors (DHALL-X0xx)
  {
    errorId: 'DHALL-X001',
    category: 'internal',
    description: 'No rule matched',
    messageTemplate:
      'No rule matched {rule} with children [{children}] while matching on:\n{dump}',
  },
  {
    errorId: 'DHALL-X002',
    category: 'internal',
    description: 'Unbalanced evaluation',
    messageTemplate: 'Parse tree evaluation ended with {reason}',
  },

  // Syntax Tree Errors (DHALL-S0xx)
  {
    errorId: 'DHALL-S001',
    category: 'syntax',
    description: 'Variable index out of range',
    messageTemplate: 'Cannot shift {name}@{index} by {delta}',
  },

  // Import Errors (DHALL-I0xx)
  {
    errorId: 'DHALL-I001',
    category: 'import',
    description: 'Import not readable',
    messageTemplate: 'Cannot read import {path}: {reason}',
  },
  {
    errorId: 'DHALL-I002',
    category: 'import',
    description: 'Unsupported import',
    messageTemplate: 'Unsupported import: {location}',
  },
  {
    errorId: 'DHALL-I003',
    category: 'import',
    description: 'Import cycle',
    messageTemplate: 'Import cycle detected: {cycle}',
  },
  {
    errorId: 'DHALL-I004',
    category: 'import',
    description: 'Unexpected import',
    messageTemplate: 'Unexpected import {location}: import resolution is disabled',
  },
  {
    errorId: 'DHALL-I005',
    category: 'import',
    description: 'Missing import',
    messageTemplate: 'Import is missing',
  },
  {
    errorId: 'DHALL-I006',
    category: 'import',
    description: 'Import not parseable',
    messageTemplate: 'Cannot parse import {path}: {reason}',
  },

  // Configuration Errors (DHALL-C0xx)
  {
    errorId: 'DHALL-C001',
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {reason}',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Cannot read import {path}: {reason}", {path: "/a.dhall", reason: "ENOENT"})
 * // Returns: "Cannot read import /a.dhall: ENOENT"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      // Unclosed brace - return template unchanged
      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        try {
          result += String(value);
        } catch {
          result += Object.prototype.toString.call(value);
        }
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
