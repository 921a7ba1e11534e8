import express, { Express } from 'express';
import cors from 'cors';
import type { Config } from './config/index.js';
import { IssueHandlers } from './commands/handlers.js';
import { CommandRouter } from './commands/router.js';
import type { JiraGateway } from './jira/types.js';
import { createCommandRoutes } from './routes/commands.js';
import { createHealthRoutes } from './routes/health.js';
import { createErrorHandler } from './middleware/error.js';

/** Wire handlers, router and HTTP routes around a Jira gateway. */
export function createApp(config: Pick<Config, 'server' | 'pagination'>, jira: JiraGateway): Express {
  const commandRouter = new CommandRouter(new IssueHandlers(jira, config.pagination));

  const app = express();

  // Middleware
  app.use(cors());
  // Non-strict: scalar bodies reach the command route, which rejects them
  app.use(express.json({ strict: false }));

  app.use(createHealthRoutes(jira));
  app.use(createCommandRoutes(commandRouter, config.server));

  // Error handling
  app.use(createErrorHandler(config.server));

  return app;
}
