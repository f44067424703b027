import { pino, stdSerializers, type DestinationStream, type LevelWithSilent, type Logger } from 'pino';
import { runtimeConfig } from './config.js';

// Call sites log failures under `error` as well as pino's own `err`
export function createLogger(level: LevelWithSilent = runtimeConfig.LOG_LEVEL, destination?: DestinationStream): Logger {
  const options = {
    name: 'video-orchestrator',
    level,
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: stdSerializers.err,
      error: stdSerializers.err
    }
  };
  return destination ? pino(options, destination) : pino(options);
}

export const logger = createLogger();
