import { RpcCaller } from '@/client';
import { GatewayConfig } from '@/types/config';
import { Logger } from '@/utils/logger';

export function testConfig(overrides: Partial<GatewayConfig> = {}): GatewayConfig {
  return {
    server: { port: 0, host: '127.0.0.1', environment: 'test' },
    logging: { level: 'debug', enableConsole: false },
    rpc: { url: 'http://rpc.test', timeout: 10000 },
    stats: { sampleCount: 30, blockHeightDelayMs: 0 },
    feed: { address: '11111111111111111111111111111111' },
    cors: { enabled: true, origin: '*', credentials: false },
    helmet: { enabled: true, contentSecurityPolicy: false },
    database: {},
    ...overrides,
  };
}

export function testLogger(): Logger {
  return Logger.getInstance(testConfig());
}

export interface RecordedCall {
  method: string;
  params: unknown[];
}

/**
 * In-process RpcCaller. Each method has a queue of replies consumed in order;
 * the last reply keeps answering once the queue is down to one. An Error reply
 * is thrown instead of returned.
 */
export class ScriptedRpc implements RpcCaller {
  readonly calls: RecordedCall[] = [];
  private readonly replies = new Map<string, unknown[]>();

  on(method: string, ...replies: unknown[]): this {
    this.replies.set(method, replies);
    return this;
  }

  methods(): string[] {
    return this.calls.map((call) => call.method);
  }

  async call(method: string, params: unknown[] = []): Promise<unknown> {
    this.calls.push({ method, params });
    const queue = this.replies.get(method);
    if (!queue || queue.length === 0) {
      throw new Error(`Unexpected RPC call: ${method}`);
    }
    const reply = queue.length > 1 ? queue.shift() : queue[0];
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}
