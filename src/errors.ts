/**
 * Error taxonomy for the export pipeline.
 *
 * AuthError and WindowComputationError abort a run. RemoteError is retried at
 * the call site and then surfaces as a per-item failure. PartialResolutionError
 * is reported but never stops the export.
 */

export class AuthError extends Error {
  override readonly name = "AuthError";

  constructor(readonly status: number, message?: string) {
    super(message ?? `Authentication rejected by remote API (HTTP ${status})`);
  }
}

export class RemoteError extends Error {
  override readonly name = "RemoteError";

  constructor(
    readonly status: number | null,
    readonly url: string,
    message: string,
    readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class PartialResolutionError extends Error {
  override readonly name = "PartialResolutionError";

  constructor(readonly missingIds: number[], options?: { cause?: unknown }) {
    super(`Could not resolve ${missingIds.length} user(s): ${missingIds.join(", ")}`, options);
  }
}

export class WindowComputationError extends Error {
  override readonly name = "WindowComputationError";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
