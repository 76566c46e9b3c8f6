import { FEED_LIMITS, SEARCH_LIMITS } from '@/config/constants';
import { ValidationError } from '@/utils/errors';

const INTEGER = /^-?\d+$/;

/**
 * Single string value of a query parameter; repeated parameters take the first value.
 */
export function queryValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

/**
 * Parse `limit` for the transaction feed: absent means the default, anything
 * else must be an integer within bounds.
 */
export function parseFeedLimit(value: unknown): number {
  const raw = queryValue(value);
  if (raw === undefined || raw.trim() === '') {
    return FEED_LIMITS.DEFAULT;
  }

  const trimmed = raw.trim();
  const limit = Number(trimmed);
  if (!INTEGER.test(trimmed) || limit < FEED_LIMITS.MIN || limit > FEED_LIMITS.MAX) {
    throw new ValidationError(`limit must be an integer between ${FEED_LIMITS.MIN} and ${FEED_LIMITS.MAX}`);
  }
  return limit;
}

export function parseSearchQuery(value: unknown): string {
  const query = queryValue(value);
  if (query === undefined || query.length < SEARCH_LIMITS.QUERY_MIN_LENGTH) {
    throw new ValidationError(`q is required and must be at least ${SEARCH_LIMITS.QUERY_MIN_LENGTH} characters`);
  }
  return query;
}
