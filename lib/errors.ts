/**
 * Fatal Error Handling
 *
 * Errors that abort a run. Everything the analysis can absorb is reported
 * through diagnostics instead.
 */

export type OmpliftErrorCode = 'E_READ' | 'E_WRITE' | 'E_CONFIG';

export class OmpliftError extends Error {
  code: OmpliftErrorCode;

  constructor(code: OmpliftErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OmpliftError';
    this.code = code;
  }
}

/**
 * The input source could not be read. Raised before any analysis phase runs.
 */
export class SourceReadError extends OmpliftError {
  file: string;

  constructor(file: string, cause?: unknown) {
    super('E_READ', `Cannot read source file ${file}: ${describeCause(cause)}`, { cause });
    this.name = 'SourceReadError';
    this.file = file;
  }
}

/**
 * The output could not be written. The destination is left as it was.
 */
export class OutputWriteError extends OmpliftError {
  file: string;

  constructor(file: string, cause?: unknown) {
    super('E_WRITE', `Cannot write output file ${file}: ${describeCause(cause)}`, { cause });
    this.name = 'OutputWriteError';
    this.file = file;
  }
}

export class ConfigError extends OmpliftError {
  file: string;
  issues: string[];

  constructor(file: string, issues: string[]) {
    super('E_CONFIG', `Invalid configuration in ${file}:\n${issues.map(i => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.file = file;
    this.issues = issues;
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return cause === undefined ? 'unknown error' : String(cause);
}
