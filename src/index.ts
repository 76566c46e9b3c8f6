import 'dotenv/config';
import { Application } from './app';

/**
 * Application Entry Point
 */
async function bootstrap(): Promise<void> {
  // Configuration is loaded by ConfigManager from config.yaml and environment variables
  const app = new Application();
  await app.start();

  const shutdown = (signal: NodeJS.Signals): void => {
    console.log(`Received ${signal}, shutting down`);
    app.stop().then(
      () => process.exit(0),
      (error) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

// Global error handlers
process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:', error);
  process.exit(1);
});

// Start the application
if (require.main === module) {
  bootstrap().catch((error) => {
    console.error('Bootstrap failed:', error);
    process.exit(1);
  });
}
