/**
 * How identifiers and bank references are compared.
 *
 * - exact: case-sensitive, verbatim
 * - letters-only: lower-cased, everything outside a-z removed
 */
export type ReferenceNormalization = 'exact' | 'letters-only';

export const REFERENCE_NORMALIZATIONS = [
  'exact',
  'letters-only',
] as const satisfies readonly ReferenceNormalization[];

export function normalizeKey(value: string, mode: ReferenceNormalization): string {
  switch (mode) {
    case 'exact':
      return value;
    case 'letters-only':
      return value.toLowerCase().replace(/[^a-z]+/g, '');
    default: {
      const exhaustive: never = mode;
      throw new Error(`Unsupported reference normalization: ${String(exhaustive)}`);
    }
  }
}
