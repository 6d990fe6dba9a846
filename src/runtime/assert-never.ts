/**
 * Exhaustiveness helper for discriminated unions (rotation steps, outcomes, error codes).
 * Use in the `default` branch of a `switch` so adding a union member breaks the build.
 */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
