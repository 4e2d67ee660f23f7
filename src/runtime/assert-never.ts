/**
 * Exhaustiveness helper for discriminated unions (`switch` on `kind` / `_tag`).
 */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
