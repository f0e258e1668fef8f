/**
 * Exhaustiveness check for discriminated unions.
 * A new union member that is not handled turns the call site into a compile error.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
