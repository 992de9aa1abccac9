export function toError(maybeError: unknown): Error {
  if (maybeError instanceof Error) {
    return maybeError;
  }

  if (typeof maybeError === "object" && maybeError !== null && "message" in maybeError) {
    return new Error(String(maybeError.message));
  }

  return new Error(String(maybeError));
}

/** Message of anything thrown, for result payloads and audit lines. */
export function errorMessage(maybeError: unknown): string {
  return toError(maybeError).message;
}
