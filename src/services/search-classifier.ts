import { RpcCaller } from '@/client';
import { SEARCH_LIMITS, TRANSACTION_FETCH_OPTIONS } from '@/config/constants';
import { AddressResult, SearchResult, SignatureResult, SlotResult } from '@/types/solana';
import {
  decodeBlockTransactionCount,
  decodeLamports,
  decodeSignatures,
  decodeTransaction,
  lamportsToSol,
} from '@/utils/decode';
import { isUpstreamError, NotFoundError, ValidationError } from '@/utils/errors';
import { Logger } from '@/utils/logger';

const DIGITS_ONLY = /^[0-9]+$/;

export type QueryKind = SearchResult['kind'];

/**
 * Decide what a search string looks like. Order matters: a digit-only string is
 * always a slot, even when its length would also fit a signature.
 * Only `slot` and `signature` are definite; everything else is tried as an address.
 */
export function classifyQuery(query: string): QueryKind {
  if (DIGITS_ONLY.test(query)) {
    return 'slot';
  }
  if (query.length >= SEARCH_LIMITS.SIGNATURE_MIN_LENGTH && query.length <= SEARCH_LIMITS.SIGNATURE_MAX_LENGTH) {
    return 'signature';
  }
  return 'address';
}

/**
 * Free-form search over slots, transaction signatures and account addresses.
 */
export class SearchClassifier {
  private readonly rpc: RpcCaller;
  private readonly logger: Logger;

  constructor(rpc: RpcCaller, logger: Logger) {
    this.rpc = rpc;
    this.logger = logger;
  }

  async search(query: string): Promise<SearchResult> {
    if (query.length < SEARCH_LIMITS.QUERY_MIN_LENGTH) {
      throw new ValidationError(`q must be at least ${SEARCH_LIMITS.QUERY_MIN_LENGTH} characters`);
    }

    const trimmed = query.trim();
    const kind = classifyQuery(trimmed);

    if (kind === 'slot') {
      return this.lookupSlot(trimmed);
    }

    if (kind === 'signature') {
      const result = await this.lookupSignature(trimmed);
      if (result) {
        return result;
      }
      this.logger.debug('Signature lookup found nothing, trying as address', { query: trimmed });
    }

    return this.lookupAddress(trimmed);
  }

  private async lookupSlot(query: string): Promise<SlotResult> {
    const slot = Number(query);
    if (!Number.isSafeInteger(slot)) {
      throw new ValidationError(`slot ${query} is out of range`);
    }

    let block: unknown = null;
    try {
      block = await this.rpc.call('getBlock', [slot, TRANSACTION_FETCH_OPTIONS]);
    } catch (error) {
      if (!isUpstreamError(error)) throw error;
      this.logger.debug('Block lookup failed, reporting slot without transactions', {
        slot,
        error: error.message,
      });
    }

    return {
      kind: 'slot',
      slot,
      transactionCount: decodeBlockTransactionCount(block),
    };
  }

  private async lookupSignature(signature: string): Promise<SignatureResult | null> {
    let raw: unknown;
    try {
      raw = await this.rpc.call('getTransaction', [signature, TRANSACTION_FETCH_OPTIONS]);
    } catch (error) {
      if (!isUpstreamError(error)) throw error;
      this.logger.debug('Signature lookup failed', { signature, error: error.message });
      return null;
    }

    const detail = decodeTransaction(raw);
    if (!detail) {
      return null;
    }

    return {
      kind: 'signature',
      signature,
      slot: detail.slot,
      feeInSol: lamportsToSol(detail.feeLamports),
      success: detail.succeeded,
    };
  }

  private async lookupAddress(address: string): Promise<AddressResult> {
    try {
      const balance = decodeLamports(await this.rpc.call('getBalance', [address]));
      const signatures = decodeSignatures(
        await this.rpc.call('getSignaturesForAddress', [address, { limit: SEARCH_LIMITS.ADDRESS_SIGNATURE_COUNT }])
      );

      return {
        kind: 'address',
        address,
        balanceInSol: lamportsToSol(balance),
        recentSignatures: signatures,
      };
    } catch (error) {
      if (!isUpstreamError(error)) throw error;
      throw new NotFoundError('Not found or invalid query', { cause: error });
    }
  }
}
