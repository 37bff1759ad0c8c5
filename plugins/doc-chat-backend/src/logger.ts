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

import { createLogger as createWinstonLogger, format, transports, Logger } from 'winston';

/**
 * Root logger for the server and the generate command.
 * Development output is colourised text, anything else JSON lines.
 */
export function createLogger(level = 'info', environment = 'development'): Logger {
  const development = environment === 'development';

  return createWinstonLogger({
    level,
    format: development
      ? format.combine(
          format.colorize(),
          format.timestamp(),
          format.errors({ stack: true }),
          format.printf(({ timestamp, level: lvl, message, stack }) =>
            stack ? `${timestamp} ${lvl} ${message}\n${stack}` : `${timestamp} ${lvl} ${message}`
          )
        )
      : format.combine(format.timestamp(), format.errors({ stack: true }), format.json()),
    transports: [new transports.Console()],
  });
}
