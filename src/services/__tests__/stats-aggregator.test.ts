import { describe, it, expect, beforeEach } from 'vitest';
import { StatsAggregator, countRecentBlocks, estimateTps } from '../stats-aggregator';
import { ScriptedRpc, testLogger } from '@/__tests__/helpers/fixtures';
import { UpstreamRpcError, UpstreamTransportError } from '@/utils/errors';

describe('StatsAggregator', () => {
  let rpc: ScriptedRpc;
  let aggregator: StatsAggregator;

  beforeEach(() => {
    rpc = new ScriptedRpc();
    aggregator = new StatsAggregator(rpc, { sampleCount: 30, blockHeightDelayMs: 0 }, testLogger());
  });

  it('combines slot, samples, vote accounts and block heights', async () => {
    rpc
      .on('getSlot', 312000000)
      .on('getRecentPerformanceSamples', [
        { numTransactions: 100, samplePeriodSecs: 60 },
        { numTransactions: 50, samplePeriodSecs: 30 },
      ])
      .on('getVoteAccounts', { current: [{}, {}, {}], delinquent: [{}] })
      .on('getBlockHeight', 290000000, 290000002);

    const stats = await aggregator.computeStats();

    expect(stats).toEqual({ tps: 1.67, slot: 312000000, validators: 4, recentBlocks: 2 });
  });

  it('issues the calls sequentially in a fixed order', async () => {
    rpc
      .on('getSlot', 1)
      .on('getRecentPerformanceSamples', [])
      .on('getVoteAccounts', {})
      .on('getBlockHeight', 10, 10);

    await aggregator.computeStats();

    expect(rpc.methods()).toEqual([
      'getSlot',
      'getRecentPerformanceSamples',
      'getVoteAccounts',
      'getBlockHeight',
      'getBlockHeight',
    ]);
    expect(rpc.calls[1].params).toEqual([30]);
  });

  it('reports tps as null when there are no samples', async () => {
    rpc
      .on('getSlot', 1)
      .on('getRecentPerformanceSamples', null)
      .on('getVoteAccounts', null)
      .on('getBlockHeight', 10, 12);

    const stats = await aggregator.computeStats();

    expect(stats.tps).toBeNull();
    expect(stats.validators).toBe(0);
    expect(stats.recentBlocks).toBe(2);
  });

  it('never reports a negative block count', async () => {
    rpc
      .on('getSlot', 1)
      .on('getRecentPerformanceSamples', [])
      .on('getVoteAccounts', {})
      .on('getBlockHeight', 500, 499);

    const stats = await aggregator.computeStats();

    expect(stats.recentBlocks).toBe(0);
  });

  it('propagates upstream failures', async () => {
    rpc
      .on('getSlot', 1)
      .on('getRecentPerformanceSamples', new UpstreamRpcError('getRecentPerformanceSamples', { code: -32601, message: 'Method not found' }));

    await expect(aggregator.computeStats()).rejects.toBeInstanceOf(UpstreamRpcError);
    expect(rpc.methods()).toEqual(['getSlot', 'getRecentPerformanceSamples']);
  });

  it('propagates transport failures from the first call', async () => {
    rpc.on('getSlot', new UpstreamTransportError('getSlot', 'HTTP 503 Service Unavailable'));

    await expect(aggregator.computeStats()).rejects.toThrow('RPC request error: HTTP 503 Service Unavailable');
  });
});

describe('estimateTps', () => {
  it('weights samples by their period instead of averaging per sample', () => {
    expect(
      estimateTps([
        { numTransactions: 100, samplePeriodSecs: 60 },
        { numTransactions: 50, samplePeriodSecs: 30 },
      ])
    ).toBe(1.67);
    expect(
      estimateTps([
        { numTransactions: 3000, samplePeriodSecs: 60 },
        { numTransactions: 10, samplePeriodSecs: 1 },
      ])
    ).toBe(49.34);
  });

  it('rounds an exact half to the even hundredth', () => {
    expect(estimateTps([{ numTransactions: 15, samplePeriodSecs: 120 }])).toBe(0.12);
  });

  it('is null for no samples or a zero total period', () => {
    expect(estimateTps([])).toBeNull();
    expect(estimateTps([{ numTransactions: 10, samplePeriodSecs: 0 }])).toBeNull();
  });

  it('is zero for a true zero rate', () => {
    expect(estimateTps([{ numTransactions: 0, samplePeriodSecs: 60 }])).toBe(0);
  });
});

describe('countRecentBlocks', () => {
  it('subtracts heights, treating absent values as zero and clamping at zero', () => {
    expect(countRecentBlocks(100, 103)).toBe(3);
    expect(countRecentBlocks(103, 100)).toBe(0);
    expect(countRecentBlocks(null, 7)).toBe(7);
    expect(countRecentBlocks(7, null)).toBe(0);
    expect(countRecentBlocks(null, null)).toBe(0);
  });
});
