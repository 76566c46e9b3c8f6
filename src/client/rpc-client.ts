import axios, { AxiosInstance, isAxiosError } from 'axios';
import { JSONRPCRequest } from '@/types/jsonrpc';
import { RPCConfig } from '@/types/config';
import { Logger } from '@/utils/logger';
import { PrometheusMetrics } from '@/telemetry/metrics';
import { UpstreamRpcError, UpstreamTransportError } from '@/utils/errors';
import { isJsonObject } from '@/utils/decode';

/**
 * Anything that can issue a single JSON-RPC call. Services depend on this
 * rather than on the HTTP client so they can run against an in-process fake.
 */
export interface RpcCaller {
  call(method: string, params?: unknown[]): Promise<unknown>;
}

/**
 * JSON-RPC client for the configured upstream.
 *
 * One POST per call: no retries, no backoff, no caching. Transport failures
 * surface as UpstreamTransportError, protocol errors as UpstreamRpcError.
 */
export class RpcClient implements RpcCaller {
  private readonly config: RPCConfig;
  private readonly logger: Logger;
  private readonly http: AxiosInstance;
  private readonly metrics = PrometheusMetrics.getInstance();

  constructor(config: RPCConfig, logger: Logger, http: AxiosInstance = axios.create()) {
    this.config = config;
    this.logger = logger;
    this.http = http;
  }

  async call(method: string, params: unknown[] = []): Promise<unknown> {
    const requestBody: JSONRPCRequest = { jsonrpc: '2.0', id: 1, method, params };
    const startTime = Date.now();
    const endTimer = this.metrics.rpcCallDurationMs.startTimer({ method });

    let body: unknown;
    try {
      const response = await this.http.post<unknown>(this.config.url, requestBody, {
        timeout: this.config.timeout,
        headers: {
          'Content-Type': 'application/json',
        },
      });
      body = response.data;
    } catch (error) {
      endTimer();
      this.metrics.rpcCallsTotal.inc({ method, outcome: 'transport_error' });
      const description = this.describeTransportError(error);
      this.logger.debug('Upstream request failed', {
        method,
        duration: Date.now() - startTime,
        error: description,
      });
      throw new UpstreamTransportError(method, description, { cause: error });
    }
    endTimer();

    if (!isJsonObject(body)) {
      this.metrics.rpcCallsTotal.inc({ method, outcome: 'transport_error' });
      throw new UpstreamTransportError(method, 'Malformed JSON-RPC response from upstream');
    }

    if (body.error !== undefined && body.error !== null) {
      this.metrics.rpcCallsTotal.inc({ method, outcome: 'rpc_error' });
      this.logger.debug('Upstream returned JSON-RPC error', {
        method,
        duration: Date.now() - startTime,
        rpcError: body.error,
      });
      throw new UpstreamRpcError(method, body.error);
    }

    this.metrics.rpcCallsTotal.inc({ method, outcome: 'success' });
    this.logger.debug('Upstream request successful', {
      method,
      duration: Date.now() - startTime,
    });

    return body.result ?? null;
  }

  private describeTransportError(error: unknown): string {
    if (!isAxiosError(error)) {
      return error instanceof Error ? error.message : String(error);
    }

    if (error.response) {
      const { status, statusText } = error.response;
      return `HTTP ${status}${statusText ? ` ${statusText}` : ''}`;
    }

    switch (error.code) {
      case 'ECONNABORTED':
      case 'ETIMEDOUT':
        return `Request timeout - upstream did not respond within ${this.config.timeout}ms`;
      case 'ECONNREFUSED':
        return 'Connection refused - upstream server is not accessible';
      case 'ENOTFOUND':
        return 'DNS resolution failed - upstream server hostname not found';
      default:
        return error.message || 'No response received from upstream server';
    }
  }
}
