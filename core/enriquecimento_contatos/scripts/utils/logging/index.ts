/**
 * Sistema de Logging Unificado
 *
 * Interface única para logging e tratamento de erros.
 *
 * @example
 * ```typescript
 * import { logger, LogLevel } from '../utils/logging/index.js';
 *
 * logger.setLevel(LogLevel.DEBUG);
 *
 * const log = logger.paraEmpresa('Padaria Central LTDA');
 * log.info('Extração iniciada');
 * ```
 */

export { logger, Logger, LogLevel, EMPRESA_SISTEMA, nivelDaConfig } from './logger.js';
export type { LogEntry, LogListener, LoggerEmpresa } from './logger.js';

export {
  withRetry,
  handleError,
  descreverErro,
  isRetryableError,
  calculateRetryDelay,
  ScraperError,
  DownloadError,
  PersistenciaError,
  ValidacaoError
} from './error-handler.js';
export type { RetryConfig } from './error-handler.js';
