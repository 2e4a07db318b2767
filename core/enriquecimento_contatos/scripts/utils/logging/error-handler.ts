/**
 * Sistema de tratamento de erros para o ETL de enriquecimento de contatos
 */
import { logger } from './logger.js';
import type { LoggerEmpresa } from './logger.js';

export class ScraperError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'ScraperError';
    Object.setPrototypeOf(this, ScraperError.prototype);
  }
}

/**
 * Falha ao baixar uma página: rede, timeout ou status HTTP fora de 2xx
 */
export class DownloadError extends ScraperError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
    public readonly code?: string,
    cause?: unknown
  ) {
    super(message, cause);
    this.name = 'DownloadError';
    Object.setPrototypeOf(this, DownloadError.prototype);
  }
}

/**
 * Falha de escrita ou conexão em um destino de armazenamento
 */
export class PersistenciaError extends ScraperError {
  constructor(message: string, public readonly destino: string, cause?: unknown) {
    super(message, cause);
    this.name = 'PersistenciaError';
    Object.setPrototypeOf(this, PersistenciaError.prototype);
  }
}

/**
 * Entrada rejeitada antes de qualquer download ou escrita
 */
export class ValidacaoError extends ScraperError {
  constructor(message: string, public readonly campo: string) {
    super(message);
    this.name = 'ValidacaoError';
    Object.setPrototypeOf(this, ValidacaoError.prototype);
  }
}

/**
 * Extrai uma mensagem legível de qualquer valor lançado
 */
export function descreverErro(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Erro desconhecido';
}

/**
 * Registra um erro no sistema de log
 */
export function handleError(error: unknown, context: string, log: LoggerEmpresa = logger.paraEmpresa(null)): void {
  if (error instanceof ScraperError) {
    log.error(`[${context}] ${error.message}`, error.cause);
  } else if (error instanceof Error) {
    log.error(`[${context}] ${error.message}`, error);
  } else {
    log.error(`[${context}] Erro desconhecido`, error);
  }
}

/**
 * Configuração de retry com backoff exponencial
 */
export interface RetryConfig {
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  jitterRange?: number;
  backoffMultiplier?: number;
}

/**
 * Calcula delay com backoff exponencial e jitter aleatório
 */
export function calculateRetryDelay(
  attempt: number,
  baseDelay: number = 500,
  maxDelay: number = 4000,
  jitterRange: number = 0.1,
  backoffMultiplier: number = 2
): number {
  const exponentialDelay = baseDelay * Math.pow(backoffMultiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelay);

  const jitterAmount = cappedDelay * jitterRange;
  const jitter = (Math.random() - 0.5) * 2 * jitterAmount;

  return Math.max(0, cappedDelay + jitter);
}

const STATUS_RETRYABLE = [408, 429, 500, 502, 503, 504];
const CODIGOS_REDE_RETRYABLE = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ECONNABORTED', 'EAI_AGAIN'];

/**
 * Determina se o erro é retryable baseado no tipo e status code
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ValidacaoError) {
    return false;
  }

  if (error instanceof DownloadError) {
    if (error.statusCode !== undefined) {
      return STATUS_RETRYABLE.includes(error.statusCode);
    }
    return error.code === undefined || CODIGOS_REDE_RETRYABLE.includes(error.code);
  }

  if (error instanceof Error && error.message.toLowerCase().includes('timeout')) {
    return true;
  }

  // Default: tentar retry para erros desconhecidos
  return true;
}

/**
 * Executa uma operação com retry e backoff exponencial
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  maxRetries: number = 3,
  retryDelay: number = 500,
  context: string = 'unknown',
  config?: RetryConfig,
  log: LoggerEmpresa = logger.paraEmpresa(null)
): Promise<T> {
  const finalConfig: Required<RetryConfig> = {
    maxRetries: config?.maxRetries ?? maxRetries,
    baseDelay: config?.baseDelay ?? retryDelay,
    maxDelay: config?.maxDelay ?? 4000,
    jitterRange: config?.jitterRange ?? 0.1,
    backoffMultiplier: config?.backoffMultiplier ?? 2
  };

  let lastError: unknown = new Error(`[${context}] Nenhuma tentativa executada`);

  for (let attempt = 1; attempt <= finalConfig.maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error)) {
        log.warn(`[${context}] ${descreverErro(error)}, não tentando novamente.`);
        throw error;
      }

      if (attempt < finalConfig.maxRetries) {
        const delay = calculateRetryDelay(
          attempt,
          finalConfig.baseDelay,
          finalConfig.maxDelay,
          finalConfig.jitterRange,
          finalConfig.backoffMultiplier
        );

        log.warn(`[${context}] Tentativa ${attempt}/${finalConfig.maxRetries} falhou: ${descreverErro(error)}. Retry em ${Math.round(delay)}ms`);

        await new Promise(resolve => setTimeout(resolve, delay));
      } else if (finalConfig.maxRetries > 1) {
        log.error(`[${context}] Todas as ${finalConfig.maxRetries} tentativas falharam`, error);
      }
    }
  }

  throw lastError;
}
