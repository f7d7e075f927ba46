/**
 * Fixed-point money in pence.
 *
 * Amounts are never held as floating point pounds; `pence` is always a safe integer.
 */
export interface Money {
  readonly pence: number;
}
