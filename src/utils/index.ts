export { backoffDelay, delay } from './delay.js';
export { createLogger, createWorkerLogger, defaultLogLevel, formatLine, type LoggerOptions } from './logger.js';
export { hostnameOf, isValidAddress, normalizeAddress } from './domain.js';
export { acceptsVersion, fetchMinimumVersion, minimumAcceptableVersion, type TextSource } from './version.js';
export {
  CrawlError,
  TransportError,
  SchemaError,
  IdentityError,
  PolicyError,
  StartupError,
  isCrawlError,
  describeError,
  type CrawlErrorKind,
} from './errors.js';
