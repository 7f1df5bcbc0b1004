/**
 * Structured Logger with Pino
 *
 * - JSON logging with Pino, pretty console output in DEV
 * - Optional daily rotated log files
 */

import pino from 'pino';
import * as rfs from 'rotating-file-stream';
import pinoPretty from 'pino-pretty';
import path from 'path';
import fs from 'fs';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

const streams: pino.StreamEntry[] = [];

if (config.console) {
  streams.push({
    level: config.level === 'silent' ? 'error' : config.level,
    stream: config.pretty
      ? pinoPretty({
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
        })
      : process.stdout,
  });
}

if (config.toFile) {
  const logsDir = path.resolve(process.cwd(), config.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  streams.push({
    level: config.level === 'silent' ? 'error' : config.level,
    stream: rfs.createStream('bridge.log', {
      interval: '1d',
      path: logsDir,
      maxFiles: config.rotateDays,
      compress: 'gzip',
    }),
  });
}

export const logger = pino(
  {
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.multistream(streams)
);

export type Logger = typeof logger;
