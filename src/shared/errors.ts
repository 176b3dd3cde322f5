/**
 * Application error types. Every error carries a stable `code` so log lines
 * can be grouped without parsing messages.
 */

export class AppError extends Error {
  readonly code: string;
  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends AppError {
  readonly issues: string[];
  constructor(issues: string[]) {
    super('config_invalid', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** Source file absent or unreadable */
export class RecordLoadError extends AppError {
  readonly file: string;
  constructor(file: string, cause: unknown) {
    super('record_load_failed', describeError(cause), { cause });
    this.file = file;
  }
}

/** A row that does not decode into the full field set */
export class RecordDecodeError extends AppError {
  readonly file: string;
  readonly line: number;
  constructor(file: string, line: number, issues: string[]) {
    super('record_decode_failed', `line ${line}: ${issues.join('; ')}`);
    this.file = file;
    this.line = line;
  }
}

export class TerminalSetupError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('terminal_setup_failed', message, { cause });
  }
}

export type ErrorPayload = { name?: string; message: string; code?: string; stack?: string };

export function toErrorPayload(err: unknown): ErrorPayload | undefined {
  if (err === undefined || err === null) return undefined;
  if (err instanceof AppError) {
    return { name: err.name, code: err.code, message: err.message, stack: err.stack };
  }
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  return { message: String(err) };
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
