import { describe, it, expect } from 'vitest';
import {
  GatewayError,
  NotFoundError,
  UpstreamRpcError,
  UpstreamTransportError,
  ValidationError,
  isUpstreamError,
} from '../errors';

describe('errors', () => {
  it('maps each error kind to its HTTP status', () => {
    expect(new UpstreamTransportError('getSlot', 'HTTP 500').statusCode).toBe(502);
    expect(new UpstreamRpcError('getSlot', { code: -1 }).statusCode).toBe(502);
    expect(new NotFoundError('Not found or invalid query').statusCode).toBe(404);
    expect(new ValidationError('bad limit').statusCode).toBe(400);
  });

  it('names errors after their class', () => {
    expect(new UpstreamRpcError('getSlot', 'boom').name).toBe('UpstreamRpcError');
    expect(new NotFoundError('missing').name).toBe('NotFoundError');
  });

  it('describes string RPC errors without quoting them', () => {
    expect(new UpstreamRpcError('getSlot', 'boom').message).toBe('RPC error: boom');
  });

  it('identifies upstream errors', () => {
    expect(isUpstreamError(new UpstreamTransportError('getSlot', 'timeout'))).toBe(true);
    expect(isUpstreamError(new UpstreamRpcError('getSlot', {}))).toBe(true);
    expect(isUpstreamError(new NotFoundError('missing'))).toBe(false);
    expect(isUpstreamError(new Error('plain'))).toBe(false);
    expect(new NotFoundError('missing')).toBeInstanceOf(GatewayError);
  });
});
