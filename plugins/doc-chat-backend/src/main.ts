#!/usr/bin/env node
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

import 'dotenv/config';
import type { Server } from 'http';
import { createApp, listen } from './app';
import { createServices } from './bootstrap';
import { ConfigService } from './services';
import { createLogger } from './logger';
import { errorMessage } from './errors';

async function main(): Promise<void> {
  const configService = ConfigService.fromEnv();
  const { appHost, appPort, logLevel, environment } = configService.getConfig();
  const logger = createLogger(logLevel, environment);

  const services = await createServices(configService, logger, 'serve');
  const app = createApp(services);

  let server: Server;
  try {
    server = await listen(app, appHost, appPort, logger);
  } catch (error) {
    logger.error(`Failed to start server on ${appHost}:${appPort}: ${errorMessage(error)}`);
    await services.close();
    process.exit(1);
  }

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);

    server.close(error => {
      if (error) {
        logger.error(`Failed to close HTTP server: ${error.message}`);
      }
      services
        .close()
        .then(() => process.exit(error ? 1 : 0))
        .catch(closeError => {
          logger.error(`Failed to close services: ${errorMessage(closeError)}`);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(error => {
  console.error(`Failed to start server: ${errorMessage(error)}`);
  process.exit(1);
});
