/**
 * Request-scoped values derived from Solana RPC responses.
 * `null` always means "no data", never zero.
 */

export interface PerformanceSample {
  numTransactions: number;
  samplePeriodSecs: number;
}

export interface VoteAccountsSnapshot {
  current: unknown[];
  delinquent: unknown[];
}

export interface TransactionDetail {
  slot: number | null;
  feeLamports: number;
  succeeded: boolean;
}

export interface TransactionSummary {
  signature: string;
  slot: number | null;
  feeInSol: number;
  label: string;
}

export interface NetworkStats {
  /** Transactions per second over the recent samples, null when there is no sample data. */
  tps: number | null;
  slot: number | null;
  validators: number;
  /**
   * Blocks produced between two block-height reads taken a few milliseconds apart.
   * Approximate by construction and never negative.
   */
  recentBlocks: number;
}

export interface SlotResult {
  kind: 'slot';
  slot: number;
  transactionCount: number;
}

export interface SignatureResult {
  kind: 'signature';
  signature: string;
  slot: number | null;
  feeInSol: number;
  success: boolean;
}

export interface AddressResult {
  kind: 'address';
  address: string;
  balanceInSol: number;
  recentSignatures: string[];
}

export type SearchResult = SlotResult | SignatureResult | AddressResult;
