import { RpcCaller } from '@/client';
import { FEED_LIMITS, TRANSACTION_FETCH_OPTIONS } from '@/config/constants';
import { FeedConfig } from '@/types/config';
import { TransactionSummary } from '@/types/solana';
import { decodeSignatures, decodeTransaction, lamportsToSol } from '@/utils/decode';
import { ValidationError } from '@/utils/errors';
import { Logger } from '@/utils/logger';
import { labelTransaction } from './transaction-labeler';

/**
 * Recent transaction summaries sampled from a busy account (the System Program
 * by default): one signature listing, then one detail lookup per signature.
 */
export class TransactionFeedBuilder {
  private readonly rpc: RpcCaller;
  private readonly config: FeedConfig;
  private readonly logger: Logger;

  constructor(rpc: RpcCaller, config: FeedConfig, logger: Logger) {
    this.rpc = rpc;
    this.config = config;
    this.logger = logger;
  }

  async recentTransactions(limit: number): Promise<TransactionSummary[]> {
    if (!Number.isInteger(limit) || limit < FEED_LIMITS.MIN || limit > FEED_LIMITS.MAX) {
      throw new ValidationError(`limit must be an integer between ${FEED_LIMITS.MIN} and ${FEED_LIMITS.MAX}`);
    }

    const signatures = decodeSignatures(
      await this.rpc.call('getSignaturesForAddress', [this.config.address, { limit }])
    );
    if (signatures.length === 0) {
      return [];
    }

    const items: TransactionSummary[] = [];
    for (const signature of signatures.slice(0, limit)) {
      const raw = await this.rpc.call('getTransaction', [signature, TRANSACTION_FETCH_OPTIONS]);
      const detail = decodeTransaction(raw);
      if (!detail) {
        this.logger.debug('Skipping unavailable transaction', { signature });
        continue;
      }

      items.push({
        signature,
        slot: detail.slot,
        feeInSol: lamportsToSol(detail.feeLamports),
        label: labelTransaction(raw),
      });
    }

    return items;
  }
}
