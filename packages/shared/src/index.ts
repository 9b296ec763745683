export { logger, type Logger } from './logger.js';
export { getTracer, withSpan } from './tracing.js';
export { parseDuration, formatDuration } from './duration.js';
export * from './resources.js';
