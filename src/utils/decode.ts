import { LAMPORTS_PER_SOL } from '@/config/constants';
import { PerformanceSample, TransactionDetail, VoteAccountsSnapshot } from '@/types/solana';

/**
 * Field decoders for upstream JSON-RPC results.
 *
 * Upstream payloads are untrusted `unknown` values. Every field the gateway reads
 * goes through one of these helpers so that the default for a missing or
 * mistyped field is stated once, here, rather than at each call site.
 */

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asObject(value: unknown): JsonObject | undefined {
  return isJsonObject(value) ? value : undefined;
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/** Finite number, or null when the value is missing or not numeric. */
export function decodeNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function decodePerformanceSamples(result: unknown): PerformanceSample[] {
  const samples: PerformanceSample[] = [];
  for (const entry of asArray(result)) {
    const sample = asObject(entry);
    if (!sample) continue;
    samples.push({
      numTransactions: decodeNumber(sample.numTransactions) ?? 0,
      samplePeriodSecs: decodeNumber(sample.samplePeriodSecs) ?? 0,
    });
  }
  return samples;
}

export function decodeVoteAccounts(result: unknown): VoteAccountsSnapshot {
  const accounts = asObject(result);
  return {
    current: asArray(accounts?.current),
    delinquent: asArray(accounts?.delinquent),
  };
}

/**
 * Signature strings from a `getSignaturesForAddress` result, in upstream order.
 * Entries without a string `signature` are dropped.
 */
export function decodeSignatures(result: unknown): string[] {
  const signatures: string[] = [];
  for (const entry of asArray(result)) {
    const signature = asObject(entry)?.signature;
    if (typeof signature === 'string') {
      signatures.push(signature);
    }
  }
  return signatures;
}

/** Null when the transaction is absent (pruned, unknown or not yet confirmed). */
export function decodeTransaction(result: unknown): TransactionDetail | null {
  const transaction = asObject(result);
  if (!transaction) return null;

  const meta = asObject(transaction.meta);
  const err = meta?.err;
  return {
    slot: decodeNumber(transaction.slot),
    feeLamports: decodeNumber(meta?.fee) ?? 0,
    succeeded: err === null || err === undefined,
  };
}

export function decodeBlockTransactionCount(result: unknown): number {
  return asArray(asObject(result)?.transactions).length;
}

/**
 * Lamport balance from `getBalance`. Solana wraps the value as `{ context, value }`;
 * a bare number is accepted as well.
 */
export function decodeLamports(result: unknown): number {
  return decodeNumber(result) ?? decodeNumber(asObject(result)?.value) ?? 0;
}

/**
 * Round to `digits` fractional digits, sending exact halves to the even neighbour.
 * Ties are judged on the exact binary value, so 0.125 is a tie but 2.675 is not.
 */
export function roundTo(value: number, digits: number): number {
  const rounded = Number(value.toFixed(digits));
  // toFixed switches to exponent notation from 1e21 on.
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return rounded;
  }

  const exact = value.toFixed(100);
  const point = exact.indexOf('.');
  if (!/^50*$/.test(exact.slice(point + 1 + digits))) {
    return rounded;
  }

  // toFixed breaks ties away from zero; truncating instead is the even choice when the kept digit is already even.
  const truncated = exact.slice(0, digits > 0 ? point + 1 + digits : point);
  const lastDigit = Number(truncated.charAt(truncated.length - 1));
  return lastDigit % 2 === 0 ? Number(truncated) : rounded;
}

export function lamportsToSol(lamports: number): number {
  return roundTo(lamports / LAMPORTS_PER_SOL, 9);
}
