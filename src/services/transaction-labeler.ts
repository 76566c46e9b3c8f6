import { isJsonObject } from '@/utils/decode';

export const FALLBACK_LABEL = 'Transaction';

/**
 * Short display label for a raw `getTransaction` record.
 *
 * Prefers the program id of the first instruction when the upstream encoding
 * carries it as a string (numeric `programIdIndex` values are not resolved
 * against the account keys). Otherwise falls back to the execution status.
 * Never throws: anything structurally unexpected yields "Transaction".
 */
export function labelTransaction(raw: unknown): string {
  if (!isJsonObject(raw)) return FALLBACK_LABEL;

  const transaction = 'transaction' in raw ? raw.transaction : {};
  if (!isJsonObject(transaction)) return FALLBACK_LABEL;

  const message = 'message' in transaction ? transaction.message : {};
  if (!isJsonObject(message)) return FALLBACK_LABEL;

  const instructions = 'instructions' in message ? message.instructions : [];
  if (!Array.isArray(instructions)) return FALLBACK_LABEL;

  if (instructions.length > 0) {
    const first: unknown = instructions[0];
    if (!isJsonObject(first)) return FALLBACK_LABEL;
    const program = first.programId || first.programIdIndex;
    if (typeof program === 'string') {
      return program;
    }
  }

  const meta = 'meta' in raw ? raw.meta : {};
  if (!isJsonObject(meta)) return FALLBACK_LABEL;

  return meta.err === null || meta.err === undefined ? 'Success' : 'Error';
}
