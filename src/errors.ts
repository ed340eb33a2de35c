export class NavigationTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for ${label}`);
    this.name = 'NavigationTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ElementNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ElementNotFoundError';
  }
}

export class InjectionFailureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InjectionFailureError';
  }
}

export class LoginFailedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LoginFailedError';
  }
}

export class ExtractionEmptyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExtractionEmptyError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Outcome of a step whose failure is expected and must not abort the flow.
 * Callers branch on `ok` instead of relying on an empty catch.
 */
export type Tolerated<T> = { ok: true; value: T } | { ok: false; error: unknown };

export async function tolerate<T>(fn: () => Promise<T>): Promise<Tolerated<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, error };
  }
}
