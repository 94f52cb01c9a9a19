import type { PluginErrorDetail } from './plugin-types';

/** Raised when Host API input breaks a layer or action invariant. */
export class ValidationError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(errors.join('; '));
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

export function toErrorDetail(err: unknown): PluginErrorDetail {
  if (err instanceof Error) {
    return err.stack
      ? { name: err.name, message: err.message, stack: err.stack }
      : { name: err.name, message: err.message };
  }
  return { name: 'Error', message: String(err) };
}
