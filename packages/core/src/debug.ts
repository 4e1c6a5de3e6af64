export class AssertionError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "AssertionError";
  }
}

let checksEnabled = process.env.NODE_ENV !== "production";

/**
 * Toggles the contract checks of the unchecked accessors (`get`, `set`, ...).
 * The `try*` and `unsafe*` families are unaffected.
 */
export function setDebugChecks(enabled: boolean): void {
  checksEnabled = enabled;
}

export function debugChecksEnabled(): boolean {
  return checksEnabled;
}

export function debugAssert(condition: boolean, message: () => string): void {
  if (checksEnabled && !condition) {
    throw new AssertionError(message());
  }
}
