/**
 * Error types surfaced at the tile-bundler boundary.
 *
 * Per-tile fetch and cache failures never throw; they are recorded as
 * outcomes. Only configuration and resource failures that make a whole
 * run impossible are raised as TileBundlerError.
 */

export type TileBundlerErrorCode =
  | 'InvalidConfig'
  | 'UnknownCountry'
  | 'CacheUnavailable'
  | 'ArchiveWriteFailed';

export class TileBundlerError extends Error {
  public readonly code: TileBundlerErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: TileBundlerErrorCode, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TileBundlerError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for logs)
   */
  public toObject(): { code: TileBundlerErrorCode; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class ConfigurationError extends TileBundlerError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], code: 'InvalidConfig' | 'UnknownCountry' = 'InvalidConfig') {
    super(code, issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, { issues });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class CacheError extends TileBundlerError {
  constructor(message: string, path: string, cause?: unknown) {
    super('CacheUnavailable', message, { path }, { cause });
    this.name = 'CacheError';
  }
}

export class ArchiveError extends TileBundlerError {
  constructor(message: string, path: string, cause?: unknown) {
    super('ArchiveWriteFailed', message, { path }, { cause });
    this.name = 'ArchiveError';
  }
}

/**
 * Normalize anything thrown into a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
