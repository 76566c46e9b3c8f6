import { HTTP_STATUS } from '@/config/constants';

/**
 * Base class for errors that map onto an HTTP status at the route boundary.
 */
export abstract class GatewayError extends Error {
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Anything that went wrong talking to the upstream JSON-RPC endpoint.
 */
export abstract class UpstreamError extends GatewayError {
  readonly statusCode: number = HTTP_STATUS.BAD_GATEWAY;

  constructor(
    readonly method: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Connection error, timeout, non-2xx status or an unreadable body. */
export class UpstreamTransportError extends UpstreamError {
  constructor(method: string, readonly description: string, options?: { cause?: unknown }) {
    super(method, `RPC request error: ${description}`, options);
  }
}

/** Well-formed response carrying an explicit JSON-RPC `error` member. */
export class UpstreamRpcError extends UpstreamError {
  constructor(method: string, readonly rpcError: unknown) {
    super(method, `RPC error: ${describeRpcError(rpcError)}`);
  }
}

export class NotFoundError extends GatewayError {
  readonly statusCode: number = HTTP_STATUS.NOT_FOUND;
}

export class ValidationError extends GatewayError {
  readonly statusCode: number = HTTP_STATUS.BAD_REQUEST;
}

export function isUpstreamError(error: unknown): error is UpstreamError {
  return error instanceof UpstreamError;
}

function describeRpcError(rpcError: unknown): string {
  if (typeof rpcError === 'string') return rpcError;
  try {
    return JSON.stringify(rpcError);
  } catch {
    return String(rpcError);
  }
}
