import { GatewayServer } from './services/gateway';
import { ConfigManager } from './config';
import { Logger } from './utils/logger';

/**
 * Main Application Class
 */
export class Application {
  private gateway: GatewayServer;
  private config = ConfigManager.getInstance().getConfig();
  private logger: Logger;

  constructor() {
    this.logger = Logger.getInstance(this.config);
    this.gateway = new GatewayServer(this.config, this.logger);
  }

  async start(): Promise<void> {
    this.logger.info('Starting Solana explorer gateway', {
      version: process.env.npm_package_version || '1.0.0',
      environment: this.config.server.environment,
      nodeVersion: process.version,
      platform: process.platform,
      arch: process.arch,
    });

    try {
      await this.gateway.start();
      this.logger.info('Application started successfully');
    } catch (error) {
      this.logger.error('Failed to start application', error instanceof Error ? error : { error: String(error) });
      throw error;
    }
  }

  async stop(): Promise<void> {
    this.logger.info('Stopping application...');
    await this.gateway.stop();
    this.logger.info('Application stopped successfully');
  }
}
