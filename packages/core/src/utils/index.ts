export type { LogLevel, Logger } from './logger.js';
export { LOG_LEVELS, createConsoleLogger, silentLogger } from './logger.js';
export {
  truncateText,
  sanitizeUrl,
  redactSecrets,
  summarizeError,
  toError,
} from './text.js';
export { sleep, raceAbort } from './timers.js';
export { normalizeTarget, resolvePath, isInternalHost } from './urls.js';
