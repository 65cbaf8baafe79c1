/**
 * Error Classes and Factory
 * Structured error types with registry-based error ids
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface DhallErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly cause?: unknown;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for every error the front end raises.
 * Provides structured data for host applications to format as needed.
 */
export class DhallError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: DhallErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }

    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(
      `${data.message}${locationStr}`,
      data.cause === undefined ? undefined : { cause: data.cause }
    );
    this.name = 'DhallError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): DhallErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: DhallErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

/**
 * Render the registry template for `errorId` and check it belongs to
 * `category`. Shared by the specialised constructors below.
 */
function renderFor(
  errorId: string,
  category: ErrorCategory,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Parse-time errors: grammar rejections and malformed literals */
export class ParseError extends DhallError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ) {
    super({
      errorId,
      message: renderFor(errorId, 'parse', context),
      location,
      context,
    });
    this.name = 'ParseError';
    this.location = location;
  }
}

/**
 * Parse tree shapes the rule table does not understand.
 * Signals a grammar/builder mismatch rather than bad input.
 */
export class DispatchError extends DhallError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location?: SourceLocation
  ) {
    super({
      errorId,
      message: renderFor(errorId, 'internal', context),
      location,
      context,
    });
    this.name = 'DispatchError';
  }
}

/** De Bruijn index arithmetic leaving the representable range */
export class ShiftError extends DhallError {
  constructor(name: string, index: number, delta: number) {
    const context = { name, index, delta };
    super({
      errorId: 'DHALL-S001',
      message: renderFor('DHALL-S001', 'syntax', context),
      context,
    });
    this.name = 'ShiftError';
  }
}

/** Import resolution failures */
export class ImportError extends DhallError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    cause?: unknown
  ) {
    super({
      errorId,
      message: renderFor(errorId, 'import', context),
      context,
      cause,
    });
    this.name = 'ImportError';
  }
}

/** Invalid .dhallrc.yaml contents */
export class ConfigError extends DhallError {
  constructor(reason: string, cause?: unknown) {
    const context = { reason };
    super({
      errorId: 'DHALL-C001',
      message: renderFor('DHALL-C001', 'config', context),
      context,
      cause,
    });
    this.name = 'ConfigError';
  }
}
