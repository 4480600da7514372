export type GatewayErrorKind =
  | "BackendUnavailable"
  | "InvalidQuery"
  | "DecodeError"
  | "SearchFailed";

export class GatewayError extends Error {
  constructor(
    readonly kind: GatewayErrorKind,
    message: string,
    readonly cause?: unknown
  ) {
    super(message);
    this.name = kind;
  }
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: GatewayError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(kind: GatewayErrorKind, message: string, cause?: unknown): Result<T> {
  return { ok: false, error: new GatewayError(kind, message, cause) };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
