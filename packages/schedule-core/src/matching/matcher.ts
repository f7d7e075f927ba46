/**
 * Matcher
 *
 * Decides which declarations a transaction could belong to. A declaration is a
 * candidate when its identifier occurs as a contiguous substring of the
 * transaction's reference. There is no fuzzy matching and no tie-break: an
 * identifier that is a substring of another identifier legitimately makes
 * both candidates, and the transaction is then ambiguous.
 */

import { normalizeKey, type Declaration, type Transaction } from '@giftaid/core';
import type { MatchOptions, MatchOutcome, MatchedTransaction } from '../types/index.js';

interface PreparedDeclaration {
  declaration: Declaration;
  key: string;
}

/**
 * Build a matcher for a fixed declaration list. Identifiers are normalized once.
 */
export function createMatcher(
  declarations: readonly Declaration[],
  options: MatchOptions = {}
): (transaction: Transaction) => MatchOutcome {
  const mode = options.normalization ?? 'exact';
  const prepared: PreparedDeclaration[] = declarations.map((declaration) => ({
    declaration,
    key: normalizeKey(declaration.identifier, mode),
  }));

  return (transaction) => {
    const reference = normalizeKey(transaction.reference, mode);
    const candidates: Declaration[] = [];

    for (const { declaration, key } of prepared) {
      // an empty key would otherwise match every reference, including an empty one
      if (key === '') continue;
      if (reference.includes(key)) {
        candidates.push(declaration);
      }
    }

    const [first] = candidates;
    if (!first) return { kind: 'unmatched' };
    if (candidates.length === 1) return { kind: 'resolved', declaration: first };
    return { kind: 'ambiguous', candidates };
  };
}

export function match(
  transaction: Transaction,
  declarations: readonly Declaration[],
  options?: MatchOptions
): MatchOutcome {
  return createMatcher(declarations, options)(transaction);
}

/**
 * Match every transaction, preserving transaction order
 */
export function matchAll(
  transactions: readonly Transaction[],
  declarations: readonly Declaration[],
  options?: MatchOptions
): MatchedTransaction[] {
  const matcher = createMatcher(declarations, options);
  return transactions.map((transaction) => ({
    transaction,
    outcome: matcher(transaction),
  }));
}
