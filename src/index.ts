import { createApp } from './app.js';
import { loadConfig, loadEnvFile } from './config/index.js';
import { JiraClient } from './jira/jira-client.js';
import logger, { configureLogger } from './utils/logger.js';

async function startServer() {
  loadEnvFile();
  const config = loadConfig();
  configureLogger(config.logging);

  const jira = new JiraClient(config.jira);
  const app = createApp(config, jira);

  const server = app.listen(config.server.port, config.server.host, () => {
    logger.info(`Jira command server running on ${config.server.host}:${config.server.port}`);
    logger.info(`Environment: ${config.server.nodeEnv}`);
    logger.info(`Forwarding commands to ${config.jira.server} as ${config.jira.user}`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    const force = setTimeout(() => {
      logger.warn('Force exiting after timeout');
      process.exit(0);
    }, 1500);

    server.close((error) => {
      if (error) {
        logger.warn('Error while closing HTTP server', error);
      } else {
        logger.info('HTTP server closed');
      }
      clearTimeout(force);
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// Start the server
startServer().catch((error) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
