import client from 'prom-client';

export class PrometheusMetrics {
	private static instance: PrometheusMetrics | undefined;

	readonly rpcCallsTotal: client.Counter<'method' | 'outcome'>;
	readonly rpcCallDurationMs: client.Histogram<'method'>;
	readonly httpRequestsTotal: client.Counter<'route' | 'status_code'>;
	readonly httpRequestDurationMs: client.Histogram<'route'>;

	static getInstance(): PrometheusMetrics {
		if (!this.instance) {
			this.instance = new PrometheusMetrics();
		}
		return this.instance;
	}

	private constructor() {
		// Default process metrics
		client.collectDefaultMetrics({
			prefix: 'gateway_',
		});

		this.rpcCallsTotal = new client.Counter({
			name: 'gateway_rpc_calls_total',
			help: 'Total upstream JSON-RPC calls by outcome (success, rpc_error, transport_error)',
			labelNames: ['method', 'outcome'],
		});

		this.rpcCallDurationMs = new client.Histogram({
			name: 'gateway_rpc_call_duration_ms',
			help: 'Duration of upstream JSON-RPC calls in milliseconds',
			labelNames: ['method'],
			buckets: [5, 10, 20, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
		});

		this.httpRequestsTotal = new client.Counter({
			name: 'gateway_http_requests_total',
			help: 'Total HTTP requests served',
			labelNames: ['route', 'status_code'],
		});

		this.httpRequestDurationMs = new client.Histogram({
			name: 'gateway_http_request_duration_ms',
			help: 'Duration of HTTP request handling in milliseconds',
			labelNames: ['route'],
			buckets: [5, 10, 20, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000],
		});
	}

	getRegister(): typeof client.register {
		return client.register;
	}
}
