/**
 * Gets the compiler to ensure that a value being switched on (or tested using
 * if statements) has had all possible values eliminated.  Adding a member to
 * the switched-on type makes every call site that misses it stop compiling.
 * @param value The value being exhaustively switched on.
 */
export function ensureExhaustiveSwitch(value: never): never {
  throw new Error(`Unhandled value: ${String(value)}`);
}
