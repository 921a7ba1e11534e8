import { Router, Request, Response } from 'express';
import type { JiraGateway } from '../jira/types.js';
import { toError } from '../errors.js';
import logger from '../utils/logger.js';

export function createHealthRoutes(jira: Pick<JiraGateway, 'getMyself'>): Router {
  const router = Router();

  // Health check: the Jira credentials must authenticate
  router.get('/health', async (_req: Request, res: Response) => {
    try {
      await jira.getMyself();
      res.json({
        status: 'healthy',
        jira_connection: 'ok',
        timestamp: new Date().toISOString(),
      });
    } catch (err) {
      const error = toError(err);
      logger.error(`Jira connection test failed: ${error.message}`);
      res.status(500).json({
        status: 'unhealthy',
        error: error.message,
        timestamp: new Date().toISOString(),
      });
    }
  });

  return router;
}
