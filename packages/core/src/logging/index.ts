export { type LogLevel, type LoggerOptions, type Logger, LOG_LEVELS, createLogger, createSilentLogger } from './logger.js';
