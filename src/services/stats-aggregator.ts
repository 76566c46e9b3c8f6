import { RpcCaller } from '@/client';
import { StatsConfig } from '@/types/config';
import { NetworkStats, PerformanceSample } from '@/types/solana';
import { decodeNumber, decodePerformanceSamples, decodeVoteAccounts, roundTo } from '@/utils/decode';
import { Logger } from '@/utils/logger';

/**
 * Network-health metrics assembled from several sequential RPC calls.
 *
 * The calls are not atomic: slot, samples, vote accounts and block heights
 * may describe slightly different upstream moments. Good enough for a
 * dashboard, not for accounting.
 */
export class StatsAggregator {
  private readonly rpc: RpcCaller;
  private readonly config: StatsConfig;
  private readonly logger: Logger;

  constructor(rpc: RpcCaller, config: StatsConfig, logger: Logger) {
    this.rpc = rpc;
    this.config = config;
    this.logger = logger;
  }

  async computeStats(): Promise<NetworkStats> {
    const slot = decodeNumber(await this.rpc.call('getSlot'));

    const samples = decodePerformanceSamples(
      await this.rpc.call('getRecentPerformanceSamples', [this.config.sampleCount])
    );
    const tps = estimateTps(samples);

    const voteAccounts = decodeVoteAccounts(await this.rpc.call('getVoteAccounts'));
    const validators = voteAccounts.current.length + voteAccounts.delinquent.length;

    const firstHeight = decodeNumber(await this.rpc.call('getBlockHeight'));
    await new Promise(resolve => setTimeout(resolve, this.config.blockHeightDelayMs));
    const secondHeight = decodeNumber(await this.rpc.call('getBlockHeight'));
    const recentBlocks = countRecentBlocks(firstHeight, secondHeight);

    this.logger.debug('Computed network stats', {
      slot,
      tps,
      validators,
      recentBlocks,
      sampleCount: samples.length,
    });

    return { tps, slot, validators, recentBlocks };
  }
}

/**
 * Transactions per second over all samples, weighting each sample by its period.
 * Null when there are no samples or the periods sum to zero.
 */
export function estimateTps(samples: PerformanceSample[]): number | null {
  if (samples.length === 0) return null;

  let transactions = 0;
  let seconds = 0;
  for (const sample of samples) {
    transactions += sample.numTransactions;
    seconds += sample.samplePeriodSecs;
  }

  return seconds > 0 ? roundTo(transactions / seconds, 2) : null;
}

/** Missing heights count as zero; the difference is clamped at zero. */
export function countRecentBlocks(first: number | null, second: number | null): number {
  return Math.max(0, (second ?? 0) - (first ?? 0));
}
