import { Router, Request, Response, NextFunction } from 'express';
import type { ServerConfig } from '../config/index.js';
import type { CommandRouter } from '../commands/router.js';
import { type Envelope, failure } from '../commands/types.js';
import logger from '../utils/logger.js';

const TIMED_OUT = Symbol('timed out');

function withTimeout<T>(work: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), ms);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createCommandRoutes(
  commandRouter: CommandRouter,
  config: Pick<ServerConfig, 'requestTimeoutMs'>
): Router {
  const router = Router();

  // POST /commands - run one command: { command, data }
  router.post('/commands', async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.is('application/json')) {
        res.status(400).json(failure('Content-Type must be application/json'));
        return;
      }
      const body: unknown = req.body;
      if (!isRecord(body)) {
        res.status(400).json(failure('Request body must be a JSON object'));
        return;
      }

      const started = Date.now();
      const envelope: Envelope | typeof TIMED_OUT = await withTimeout(
        commandRouter.dispatch(body.command, body.data),
        config.requestTimeoutMs
      );
      if (envelope === TIMED_OUT) {
        logger.error(`Command ${String(body.command)} timed out after ${config.requestTimeoutMs}ms`);
        res.status(504).json(failure('Request timed out'));
        return;
      }

      logger.info(`Command ${String(body.command)} -> ${envelope.status}`, {
        durationMs: Date.now() - started,
      });
      res.json(envelope);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
