/**
 * A context bucket value outside the known set.
 *
 * Not fatal and never thrown: the scorer substitutes the neutral value
 * and reports one of these so the caller can log it.
 */
export class InvalidContextValue extends Error {
  constructor(
    readonly field: string,
    readonly value: string,
    readonly fallback: number,
  ) {
    super(`Unknown ${field} value "${value}", using neutral ${fallback}`);
    this.name = 'InvalidContextValue';
  }
}
