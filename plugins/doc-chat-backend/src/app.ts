/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

import * as path from 'path';
import type { Server } from 'http';
import express, { ErrorRequestHandler, Express } from 'express';
import type { Logger } from 'winston';
import { ApiEnvironment, createApiRouter } from './router';
import { errorMessage } from './errors';

function statusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
}

/**
 * Create the HTTP application: the API under `/api`, the data directory
 * under `/data` and a redirect from `/` to the health check.
 */
export function createApp(env: ApiEnvironment): Express {
  const app = express();
  const { logger, config } = env;

  app.use('/api', createApiRouter(env));
  app.use('/data', express.static(path.resolve(config.getConfig().dataDir)));

  app.get('/', (_req, res) => {
    res.redirect('/api/health');
  });

  // Body parser failures (malformed JSON, oversized payloads) land here
  const errorHandler: ErrorRequestHandler = (error: unknown, _req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const status = statusOf(error);
    if (status >= 500) {
      logger.error(`Unhandled request error: ${errorMessage(error)}`);
    }
    res.status(status).json({
      error: status < 500 ? 'Invalid request' : 'Internal server error',
      message: errorMessage(error),
    });
  };
  app.use(errorHandler);

  return app;
}

/**
 * Start listening. Rejects when the port cannot be bound; errors after
 * start-up are logged.
 */
export function listen(app: Express, host: string, port: number, logger: Logger): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);

    const onStartupError = (error: Error) => {
      reject(error);
    };
    server.once('error', onStartupError);
    server.once('listening', () => {
      server.off('error', onStartupError);
      server.on('error', error => {
        logger.error(`HTTP server error: ${error.message}`);
      });
      logger.info(`Chat API listening on http://${host}:${port}`);
      resolve(server);
    });
  });
}
