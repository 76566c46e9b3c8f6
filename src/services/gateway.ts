import http from 'http';
import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { GatewayConfig } from '@/types/config';
import { DiagnosticReport, HealthCheckResponse } from '@/types/jsonrpc';
import { RpcCaller, RpcClient } from '@/client';
import { HTTP_STATUS } from '@/config/constants';
import { DatabaseProbe, SqliteDatabaseProbe } from '@/diagnostics/database-probe';
import { createErrorLogger, createPerformanceLogger, createRequestLogger } from '@/middleware/logging';
import { parseFeedLimit, parseSearchQuery } from '@/middleware/validation';
import { PrometheusMetrics } from '@/telemetry/metrics';
import { GatewayError } from '@/utils/errors';
import { Logger } from '@/utils/logger';
import { SearchClassifier } from './search-classifier';
import { StatsAggregator } from './stats-aggregator';
import { TransactionFeedBuilder } from './transaction-feed';

export interface GatewayDependencies {
	rpc?: RpcCaller;
	databaseProbe?: DatabaseProbe;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const VERSION = process.env.npm_package_version || '1.0.0';

/**
 * Express front end: REST routes over the stats, feed and search services.
 */
export class GatewayServer {
	private readonly app = express();
	private server?: http.Server;
	private readonly config: GatewayConfig;
	private readonly logger: Logger;
	private readonly metrics = PrometheusMetrics.getInstance();
	private readonly startedAt = Date.now();
	private readonly rpc: RpcCaller;
	private readonly databaseProbe: DatabaseProbe;
	private readonly stats: StatsAggregator;
	private readonly feed: TransactionFeedBuilder;
	private readonly searcher: SearchClassifier;

	constructor(config: GatewayConfig, logger: Logger, deps: GatewayDependencies = {}) {
		this.config = config;
		this.logger = logger;
		this.rpc = deps.rpc ?? new RpcClient(config.rpc, logger);
		this.databaseProbe = deps.databaseProbe ?? new SqliteDatabaseProbe(config.database);

		this.stats = new StatsAggregator(this.rpc, config.stats, logger);
		this.feed = new TransactionFeedBuilder(this.rpc, config.feed, logger);
		this.searcher = new SearchClassifier(this.rpc, logger);

		this.setupMiddleware();
		this.setupRoutes();
	}

	async start(): Promise<void> {
		await new Promise<void>((resolve, reject) => {
			const server = this.app.listen(this.config.server.port, this.config.server.host, () => {
				this.logger.info('HTTP server listening', {
					host: this.config.server.host,
					port: this.getPort(),
					upstream: this.config.rpc.url,
				});
				resolve();
			});
			server.once('error', reject);
			this.server = server;
		});
	}

	async stop(): Promise<void> {
		const server = this.server;
		if (!server) return;

		await new Promise<void>((resolve, reject) => {
			server.close((err) => (err ? reject(err) : resolve()));
		});
		this.server = undefined;
	}

	/** Bound port once started; differs from the configured one when that is 0. */
	getPort(): number | undefined {
		const address = this.server?.address();
		return address && typeof address === 'object' ? address.port : undefined;
	}

	private setupMiddleware(): void {
		if (this.config.helmet.enabled) {
			this.app.use(helmet({ contentSecurityPolicy: this.config.helmet.contentSecurityPolicy }));
		}
		if (this.config.cors.enabled) {
			this.app.use(cors({ origin: this.config.cors.origin, credentials: this.config.cors.credentials }));
		}

		this.app.use(createRequestLogger(this.logger));
		this.app.use(createPerformanceLogger(this.logger, this.metrics));
	}

	private setupRoutes(): void {
		this.app.get('/', (_req: Request, res: Response) => {
			res.status(HTTP_STATUS.OK).json({ message: 'Solana explorer gateway', version: VERSION });
		});

		this.app.get('/api/hello', (_req: Request, res: Response) => {
			res.status(HTTP_STATUS.OK).json({ message: 'Hello from the gateway API!' });
		});

		this.app.get('/health', this.route(async (_req, res) => {
			const upstream = await this.checkUpstream();
			const body: HealthCheckResponse = {
				status: upstream ? 'healthy' : 'degraded',
				timestamp: new Date().toISOString(),
				uptime: Math.floor((Date.now() - this.startedAt) / 1000),
				version: VERSION,
				upstream: upstream ? 'connected' : 'disconnected',
			};
			res.status(HTTP_STATUS.OK).json(body);
		}));

		this.app.get('/metrics', this.route(async (_req, res) => {
			const register = this.metrics.getRegister();
			res.set('Content-Type', register.contentType);
			res.status(HTTP_STATUS.OK).send(await register.metrics());
		}));

		this.app.get('/test', this.route(async (_req, res) => {
			const status = await this.databaseProbe.probe();
			const body: DiagnosticReport = {
				backend: 'running',
				database: status.database,
				databaseUrl: this.config.database.url ? 'set' : 'not set',
				databaseName: this.config.database.name ? 'set' : 'not set',
				connectionStatus: status.connectionStatus,
				tables: status.tables,
				solanaRpc: this.config.rpc.url,
			};
			res.status(HTTP_STATUS.OK).json(body);
		}));

		this.app.get('/api/solana/stats', this.route(async (_req, res) => {
			res.status(HTTP_STATUS.OK).json(await this.stats.computeStats());
		}));

		this.app.get('/api/solana/recent-transactions', this.route(async (req, res) => {
			const limit = parseFeedLimit(req.query.limit);
			const items = await this.feed.recentTransactions(limit);
			res.status(HTTP_STATUS.OK).json({ items });
		}));

		this.app.get('/api/solana/search', this.route(async (req, res) => {
			const query = parseSearchQuery(req.query.q);
			res.status(HTTP_STATUS.OK).json(await this.searcher.search(query));
		}));

		this.app.use(createErrorLogger(this.logger));
		this.app.use(this.errorResponder);
	}

	/** Forward rejections from async handlers to the error middleware. */
	private route(handler: AsyncHandler) {
		return (req: Request, res: Response, next: NextFunction): void => {
			handler(req, res).catch(next);
		};
	}

	private async checkUpstream(): Promise<boolean> {
		try {
			await this.rpc.call('getHealth');
			return true;
		} catch (error) {
			this.logger.warn('Upstream health check failed', {
				error: error instanceof Error ? error.message : String(error),
			});
			return false;
		}
	}

	private errorResponder = (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
		if (err instanceof GatewayError) {
			res.status(err.statusCode).json({ error: err.name, message: err.message });
			return;
		}
		res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json({ error: 'InternalError', message: 'Internal server error' });
	};
}
