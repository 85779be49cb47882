export type MoodErrorCode =
  | 'missing-credentials'
  | 'invalid-credentials'
  | 'auth-failed'
  | 'lookup-failed'
  | 'create-failed'
  | 'append-failed'
  | 'read-failed'
  | 'parse-failed';

export class MoodSheetError extends Error {
  readonly code: MoodErrorCode;
  constructor(code: MoodErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.code = code;
    this.name = new.target.name;
  }
}

export class ConfigError extends MoodSheetError {
  constructor(code: 'missing-credentials' | 'invalid-credentials', message: string, cause?: unknown) { super(code, message, cause); }
}
export class AuthError extends MoodSheetError {
  constructor(message: string, cause?: unknown) { super('auth-failed', message, cause); }
}
export class LookupError extends MoodSheetError {
  constructor(message: string, cause?: unknown) { super('lookup-failed', message, cause); }
}
export class CreateError extends MoodSheetError {
  constructor(message: string, cause?: unknown) { super('create-failed', message, cause); }
}
export class AppendError extends MoodSheetError {
  constructor(message: string, cause?: unknown) { super('append-failed', message, cause); }
}
export class ReadError extends MoodSheetError {
  constructor(code: 'read-failed' | 'parse-failed', message: string, cause?: unknown) { super(code, message, cause); }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return typeof e === 'string' ? e : 'unknown error';
}
