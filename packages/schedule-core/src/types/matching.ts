/**
 * Matching Types
 *
 * Outcome of looking up the declarations a transaction could belong to.
 */

import type { Declaration, ReferenceNormalization, Transaction } from '@giftaid/core';

export type MatchOutcome =
  /** No declaration identifier occurs in the reference */
  | { kind: 'unmatched' }
  /** Exactly one declaration identifier occurs in the reference */
  | { kind: 'resolved'; declaration: Declaration }
  /** Several identifiers occur; candidates keep declaration order */
  | { kind: 'ambiguous'; candidates: readonly Declaration[] };

export interface MatchOptions {
  /** How identifiers and references are compared (default: 'exact') */
  normalization?: ReferenceNormalization;
}

export interface MatchedTransaction {
  transaction: Transaction;
  outcome: MatchOutcome;
}
