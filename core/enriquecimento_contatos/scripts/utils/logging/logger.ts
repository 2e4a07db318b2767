/**
 * Sistema de logs para o ETL de enriquecimento de contatos
 *
 * Toda entrada carrega a empresa a que se refere (ou `SISTEMA` para eventos
 * gerais). O contexto é passado explicitamente: quem registra em nome de uma
 * empresa recebe um `LoggerEmpresa` obtido com `logger.paraEmpresa(nome)`.
 */
import { etlConfig } from '../../../../../config/index.js';
import type { NivelLog } from '../../../../../config/index.js';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

/** Rótulo usado em eventos que não pertencem a uma empresa */
export const EMPRESA_SISTEMA = 'SISTEMA';

export interface LogEntry {
  timestamp: string;
  nivel: LogLevel;
  empresa: string;
  mensagem: string;
  dados?: unknown;
}

export type LogListener = (entry: LogEntry) => void;

/**
 * Visão do logger presa a uma empresa
 */
export interface LoggerEmpresa {
  readonly empresa: string;
  error(message: string, error?: unknown): void;
  warn(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
}

const ROTULOS: Record<LogLevel, string> = {
  [LogLevel.ERROR]: 'ERRO',
  [LogLevel.WARN]: 'AVISO',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG'
};

const NIVEIS_CONFIG: Record<NivelLog, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG
};

export function nivelDaConfig(nivel: NivelLog): LogLevel {
  return NIVEIS_CONFIG[nivel];
}

export class Logger {
  private level: LogLevel;
  private readonly showTimestamp: boolean;
  private listeners: LogListener[] = [];

  constructor(level: LogLevel = LogLevel.INFO, showTimestamp = true) {
    this.level = level;
    this.showTimestamp = showTimestamp;
  }

  /**
   * Define o nível de log
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Obtém o nível atual de log
   */
  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Inscreve um ouvinte que recebe cada entrada emitida.
   * Retorna a função que cancela a inscrição.
   */
  onEntry(listener: LogListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  /**
   * Registra uma entrada para a empresa informada
   */
  registrar(nivel: LogLevel, empresa: string, mensagem: string, dados?: unknown): void {
    if (this.level < nivel) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      nivel,
      empresa,
      mensagem
    };
    if (dados !== undefined) {
      entry.dados = dados;
    }

    this.escreverNoConsole(entry);
    this.listeners.forEach(listener => listener(entry));
  }

  error(message: string, error?: unknown): void {
    this.registrar(LogLevel.ERROR, EMPRESA_SISTEMA, message, error);
  }

  warn(message: string, data?: unknown): void {
    this.registrar(LogLevel.WARN, EMPRESA_SISTEMA, message, data);
  }

  info(message: string, data?: unknown): void {
    this.registrar(LogLevel.INFO, EMPRESA_SISTEMA, message, data);
  }

  debug(message: string, data?: unknown): void {
    this.registrar(LogLevel.DEBUG, EMPRESA_SISTEMA, message, data);
  }

  /**
   * Retorna uma visão do logger que marca cada entrada com a empresa
   */
  paraEmpresa(empresa: string | null | undefined): LoggerEmpresa {
    const rotulo = empresa && empresa.trim() ? empresa.trim() : EMPRESA_SISTEMA;
    return {
      empresa: rotulo,
      error: (message, error) => this.registrar(LogLevel.ERROR, rotulo, message, error),
      warn: (message, data) => this.registrar(LogLevel.WARN, rotulo, message, data),
      info: (message, data) => this.registrar(LogLevel.INFO, rotulo, message, data),
      debug: (message, data) => this.registrar(LogLevel.DEBUG, rotulo, message, data)
    };
  }

  private escreverNoConsole(entry: LogEntry): void {
    const prefixo = this.showTimestamp ? `${entry.timestamp} ` : '';
    const linha = `${prefixo}[${ROTULOS[entry.nivel]}] [${entry.empresa}] ${entry.mensagem}`;

    switch (entry.nivel) {
      case LogLevel.ERROR:
        console.error(linha);
        if (entry.dados instanceof Error) {
          console.error(`Stack: ${entry.dados.stack}`);
        } else if (entry.dados !== undefined) {
          console.error(entry.dados);
        }
        break;
      case LogLevel.WARN:
        console.warn(linha);
        if (entry.dados !== undefined) console.warn(entry.dados);
        break;
      case LogLevel.INFO:
        console.info(linha);
        if (entry.dados !== undefined) console.info(entry.dados);
        break;
      case LogLevel.DEBUG:
        console.debug(linha);
        if (entry.dados !== undefined) console.debug(entry.dados);
        break;
    }
  }
}

// Exporta uma instância única do logger
export const logger = new Logger(
  nivelDaConfig(etlConfig.logging.level),
  etlConfig.logging.showTimestamp
);
