/**
 * Compile-time exhaustiveness check for switches over discriminated unions.
 * Adding a member without handling it turns the `default` branch into a type error.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled union member: ${JSON.stringify(value)}`);
}
