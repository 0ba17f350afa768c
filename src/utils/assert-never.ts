/**
 * Exhaustiveness guard for switches over unions and enums
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
