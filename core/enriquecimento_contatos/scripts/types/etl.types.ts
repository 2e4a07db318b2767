/**
 * Tipos centralizados para o sistema ETL
 *
 * Interfaces e tipos compartilhados pelos processadores, pelo executor
 * e pela linha de comando.
 */

import type { ETLConfig } from '../../../../config/index.js';
import type { Logger } from '../utils/logging/index.js';
import type { EmpresaAlvo } from './contatos.types.js';

export type Destino = 'postgres' | 'firestore' | 'emulator' | 'pc';

/**
 * Opções comuns para os processadores ETL
 */
export interface ETLOptions {
  // Entrada
  empresas: EmpresaAlvo[];
  limite?: number;

  // Destino dos dados
  destino: Destino[];

  // Configurações de execução
  concorrencia?: number;
  timeout?: number;
  tentativas?: number;
  verbose?: boolean;
  dryRun?: boolean;

  // Interrompe o lançamento de novos itens (itens em andamento terminam)
  signal?: AbortSignal;
}

export type EtapaETL = 'validacao' | 'extracao' | 'transformacao' | 'carregamento';

/**
 * Erro estruturado do ETL
 */
export interface ETLError {
  codigo: string;
  mensagem: string;
  contexto?: Record<string, unknown>;
  timestamp: string;
  stack?: string;
}

/**
 * Desfecho de um item do lote
 */
export type ResultadoItem<TItem, TSaida> =
  | {
      status: 'sucesso';
      item: TItem;
      saida: TSaida;
      persistido: boolean;
      duracaoMs: number;
    }
  | {
      status: 'falha';
      item: TItem;
      etapa: EtapaETL;
      erro: ETLError;
      duracaoMs: number;
    };

/**
 * Resultado padrão de processamento ETL
 */
export interface ETLResult<TItem, TSaida> {
  sucessos: number;
  falhas: number;
  avisos: number;
  ignorados: number;
  cancelado: boolean;

  tempoProcessamento: number;
  destino: string;

  resultados: ResultadoItem<TItem, TSaida>[];
  erros: ETLError[];
}

export interface ContadorEtapa {
  total: number;
  sucesso: number;
  falha: number;
}

/**
 * Estatísticas de processamento
 */
export interface ProcessingStats {
  inicio: number;
  fim?: number;

  processados: number;
  erros: number;
  avisos: number;
  ignorados: number;

  validacao: ContadorEtapa;
  extracao: ContadorEtapa;
  transformacao: ContadorEtapa;
  carregamento: ContadorEtapa;
}

/**
 * Contexto de processamento compartilhado
 */
export interface ProcessingContext {
  options: ETLOptions;
  config: ETLConfig;
  logger: Logger;
  stats: ProcessingStats;
}

/**
 * Resultado de validação
 */
export interface ValidationResult {
  valido: boolean;
  erros: string[];
  avisos: string[];
}

export enum ProcessingStatus {
  INICIADO = 'INICIADO',
  EXTRAINDO = 'EXTRAINDO',
  FINALIZADO = 'FINALIZADO',
  ERRO = 'ERRO',
  CANCELADO = 'CANCELADO'
}

/**
 * Evento de progresso
 */
export interface ProgressEvent {
  status: ProcessingStatus;
  progresso: number; // 0-100
  mensagem: string;
}

export type ProgressCallback = (event: ProgressEvent) => void;
