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
import { createServices } from './bootstrap';
import { ConfigService } from './services';
import { createLogger } from './logger';
import { errorMessage } from './errors';

/**
 * Build the index from the data directory and write it to storage
 */
async function generateDatasource(): Promise<void> {
  const configService = ConfigService.fromEnv();
  const { logLevel, environment, dataDir, storageDir } = configService.getConfig();
  const logger = createLogger(logLevel, environment);

  logger.info(`Creating new index from ${dataDir}`);
  const services = await createServices(configService, logger, 'generate');

  try {
    const { documents, nodes } = await services.ragService.indexAllDocuments();
    logger.info(`Finished creating new index: ${documents} documents, ${nodes} nodes stored in ${storageDir}`);
  } finally {
    await services.close();
  }
}

generateDatasource().catch(error => {
  console.error(`Failed to generate the index: ${errorMessage(error)}`);
  process.exit(1);
});
