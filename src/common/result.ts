export type Success<T extends object = object> = { success: true } & T;

export interface Failure {
  success: false;
  error: string;
}

/** Outcome of a business operation: validation and not-found cases never throw. */
export type Result<T extends object = object> = Success<T> | Failure;

export function ok(): Success;
export function ok<T extends object>(value: T): Success<T>;
export function ok(value: object = {}): Success {
  return { success: true, ...value };
}

export function fail(error: string): Failure {
  return { success: false, error };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  return typeof error === 'string' && error ? error : 'Unknown error';
}
