/**
 * Processador base para ETL por item
 *
 * Esta classe abstrata implementa o padrão Template Method para garantir um
 * fluxo ETL consistente: cada item passa por validação, extração,
 * transformação e carregamento, e a falha de um item não interrompe os demais.
 */

import {
  ProcessingStatus
} from '../types/index.js';
import type {
  ETLError,
  ETLOptions,
  ETLResult,
  EtapaETL,
  ProcessingContext,
  ProcessingStats,
  ProgressCallback,
  ProgressEvent,
  ResultadoItem,
  ValidationResult
} from '../types/index.js';
import { etlConfig } from '../../../../config/index.js';
import type { ETLConfig } from '../../../../config/index.js';
import { logger, handleError, descreverErro } from '../utils/logging/index.js';
import type { LoggerEmpresa } from '../utils/logging/index.js';

/**
 * Classe base abstrata para processadores ETL
 */
export abstract class ETLProcessor<TItem, TExtraido, TSaida> {
  protected context: ProcessingContext;
  private progressCallbacks: ProgressCallback[] = [];
  private filasPorChave = new Map<string, Promise<void>>();

  constructor(options: ETLOptions, config: ETLConfig = etlConfig) {
    this.context = {
      options,
      config,
      logger,
      stats: this.initializeStats()
    };

    this.logConfiguration();
  }

  /**
   * Inicializa as estatísticas de processamento
   */
  private initializeStats(): ProcessingStats {
    return {
      inicio: Date.now(),
      processados: 0,
      erros: 0,
      avisos: 0,
      ignorados: 0,
      validacao: { total: 0, sucesso: 0, falha: 0 },
      extracao: { total: 0, sucesso: 0, falha: 0 },
      transformacao: { total: 0, sucesso: 0, falha: 0 },
      carregamento: { total: 0, sucesso: 0, falha: 0 }
    };
  }

  /**
   * Registra as configurações atuais
   */
  private logConfiguration(): void {
    this.context.logger.info('='.repeat(60));
    this.context.logger.info(`🚀 ${this.getProcessName()}`);
    this.context.logger.info('='.repeat(60));

    if (this.context.options.verbose) {
      this.context.logger.debug('Configurações:', {
        itens: this.context.options.empresas.length,
        limite: this.context.options.limite,
        concorrência: this.concorrencia(),
        tentativas: this.context.options.tentativas ?? this.context.config.scraper.maxRetries,
        timeout: `${this.context.options.timeout ?? this.context.config.scraper.timeout}ms`,
        destino: this.context.options.destino,
        dryRun: Boolean(this.context.options.dryRun)
      });
    }
  }

  protected concorrencia(): number {
    return this.context.options.concorrencia ?? this.context.config.scraper.concurrency;
  }

  /**
   * Registra um callback de progresso
   */
  onProgress(callback: ProgressCallback): void {
    this.progressCallbacks.push(callback);
  }

  /**
   * Emite um evento de progresso
   */
  protected emitProgress(status: ProcessingStatus, progresso: number, mensagem: string): void {
    const event: ProgressEvent = { status, progresso, mensagem };
    this.progressCallbacks.forEach(cb => cb(event));

    const emoji = this.getStatusEmoji(status);
    this.context.logger.info(`${emoji} ${mensagem} (${progresso}%)`);
  }

  private getStatusEmoji(status: ProcessingStatus): string {
    const emojis: Record<ProcessingStatus, string> = {
      [ProcessingStatus.INICIADO]: '🚀',
      [ProcessingStatus.EXTRAINDO]: '📥',
      [ProcessingStatus.FINALIZADO]: '✅',
      [ProcessingStatus.ERRO]: '❌',
      [ProcessingStatus.CANCELADO]: '🚫'
    };
    return emojis[status];
  }

  /**
   * Processa todos os itens em lotes do tamanho da concorrência
   */
  async process(): Promise<ETLResult<TItem, TSaida>> {
    const resultados: ResultadoItem<TItem, TSaida>[] = [];
    const { signal } = this.context.options;

    try {
      this.emitProgress(ProcessingStatus.INICIADO, 0, 'Iniciando processamento ETL');

      this.context.logger.info('📋 Validação das opções');
      const validacao = await this.validate();
      if (!validacao.valido) {
        throw new Error(`Validação falhou: ${validacao.erros.join(', ')}`);
      }
      validacao.avisos.forEach(aviso => {
        this.context.logger.warn(`⚠️ ${aviso}`);
        this.incrementWarnings();
      });

      const itens = this.listarItens();
      const tamanhoLote = this.concorrencia();
      const totalLotes = Math.ceil(itens.length / tamanhoLote);
      let cancelado = false;

      if (this.context.options.dryRun) {
        this.context.logger.warn('🔍 Modo DRY-RUN: Dados não serão salvos');
      }

      for (let i = 0; i < itens.length; i += tamanhoLote) {
        if (signal?.aborted) {
          cancelado = true;
          this.context.stats.ignorados += itens.length - i;
          this.context.logger.warn(`Processamento interrompido: ${itens.length - i} item(ns) não iniciados`);
          break;
        }

        const lote = itens.slice(i, i + tamanhoLote);
        const numeroLote = Math.floor(i / tamanhoLote) + 1;
        this.context.logger.info(`📦 Lote ${numeroLote}/${totalLotes} (${lote.length} item(ns))`);

        const desfechos = await Promise.allSettled(lote.map(item => this.processarItem(item)));
        desfechos.forEach((desfecho, indice) => {
          resultados.push(desfecho.status === 'fulfilled'
            ? desfecho.value
            : this.resultadoDeFalha(lote[indice], 'carregamento', desfecho.reason, 0));
        });

        const concluidos = Math.min(i + tamanhoLote, itens.length);
        this.emitProgress(
          ProcessingStatus.EXTRAINDO,
          Math.round((concluidos / itens.length) * 100),
          `${concluidos}/${itens.length} item(ns) processados`
        );

        const pausa = this.context.config.scraper.pauseBetweenBatches;
        if (concluidos < itens.length && pausa > 0 && !signal?.aborted) {
          await new Promise(resolve => setTimeout(resolve, pausa));
        }
      }

      this.context.stats.fim = Date.now();
      const resultado = this.finalize(resultados, cancelado);

      if (cancelado) {
        this.emitProgress(ProcessingStatus.CANCELADO, 100, 'Processamento cancelado');
      } else {
        this.emitProgress(ProcessingStatus.FINALIZADO, 100, 'Processamento concluído');
      }
      this.logResultado(resultado);

      return resultado;

    } catch (error) {
      const mensagem = descreverErro(error);
      this.emitProgress(ProcessingStatus.ERRO, 0, `Erro: ${mensagem}`);
      handleError(error, this.getProcessName());

      return {
        sucessos: 0,
        falhas: Math.max(1, this.context.stats.erros),
        avisos: this.context.stats.avisos,
        ignorados: this.context.stats.ignorados,
        cancelado: false,
        tempoProcessamento: (Date.now() - this.context.stats.inicio) / 1000,
        destino: this.descreverDestino(),
        resultados,
        erros: [this.criarErro(error, 'ETL_ERROR')]
      };
    }
  }

  /**
   * Executa as quatro etapas de um item e devolve o desfecho
   */
  private async processarItem(itemOriginal: TItem): Promise<ResultadoItem<TItem, TSaida>> {
    const inicio = Date.now();
    let item = itemOriginal;
    let etapa: EtapaETL = 'validacao';

    try {
      item = this.executarEtapa('validacao', () => this.validarItem(itemOriginal));

      etapa = 'extracao';
      const extraido = await this.executarEtapaAsync('extracao', () => this.extrair(item));

      etapa = 'transformacao';
      const saida = await this.executarEtapaAsync('transformacao', () => this.transformar(item, extraido));

      let persistido = false;
      if (!this.context.options.dryRun) {
        etapa = 'carregamento';
        await this.executarEtapaAsync('carregamento', () =>
          this.serializarPorChave(this.chaveDoItem(item), () => this.carregar(item, saida))
        );
        persistido = true;
      }

      this.context.stats.processados++;
      return { status: 'sucesso', item, saida, persistido, duracaoMs: Date.now() - inicio };

    } catch (error) {
      this.context.stats.processados++;
      return this.resultadoDeFalha(item, etapa, error, Date.now() - inicio);
    }
  }

  private executarEtapa<T>(etapa: EtapaETL, operacao: () => T): T {
    this.context.stats[etapa].total++;
    try {
      const resultado = operacao();
      this.context.stats[etapa].sucesso++;
      return resultado;
    } catch (error) {
      this.context.stats[etapa].falha++;
      throw error;
    }
  }

  private async executarEtapaAsync<T>(etapa: EtapaETL, operacao: () => Promise<T>): Promise<T> {
    this.context.stats[etapa].total++;
    try {
      const resultado = await operacao();
      this.context.stats[etapa].sucesso++;
      return resultado;
    } catch (error) {
      this.context.stats[etapa].falha++;
      throw error;
    }
  }

  private resultadoDeFalha(
    item: TItem,
    etapa: EtapaETL,
    error: unknown,
    duracaoMs: number
  ): ResultadoItem<TItem, TSaida> {
    this.context.stats.erros++;
    const erro = this.criarErro(error, 'ITEM_ERROR', { etapa, item: this.descreverItem(item) });
    this.logDoItem(item).error(`Falha na etapa de ${etapa}: ${erro.mensagem}`);
    return { status: 'falha', item, etapa, erro, duracaoMs };
  }

  private criarErro(error: unknown, codigoPadrao: string, contexto?: Record<string, unknown>): ETLError {
    return {
      codigo: error instanceof Error && error.name !== 'Error' ? error.name : codigoPadrao,
      mensagem: descreverErro(error),
      contexto,
      timestamp: new Date().toISOString(),
      stack: error instanceof Error ? error.stack : undefined
    };
  }

  /**
   * Carregamentos de um mesmo item rodam um de cada vez, na ordem de chegada
   */
  private serializarPorChave<T>(chave: string, operacao: () => Promise<T>): Promise<T> {
    const anterior = this.filasPorChave.get(chave) ?? Promise.resolve();
    const execucao = anterior.then(operacao);
    // O erro segue para quem chamou; a fila apenas espera o término
    const fila = execucao.then(() => undefined, () => undefined);
    this.filasPorChave.set(chave, fila);
    void fila.then(() => {
      if (this.filasPorChave.get(chave) === fila) {
        this.filasPorChave.delete(chave);
      }
    });
    return execucao;
  }

  private descreverDestino(): string {
    return this.context.options.dryRun ? 'dry-run' : this.context.options.destino.join(', ');
  }

  /**
   * Finaliza o processamento e prepara o resultado
   */
  protected finalize(resultados: ResultadoItem<TItem, TSaida>[], cancelado: boolean): ETLResult<TItem, TSaida> {
    const fim = this.context.stats.fim ?? Date.now();
    const erros: ETLError[] = [];
    let sucessos = 0;

    for (const resultado of resultados) {
      if (resultado.status === 'sucesso') {
        sucessos++;
      } else {
        erros.push(resultado.erro);
      }
    }

    return {
      sucessos,
      falhas: erros.length,
      avisos: this.context.stats.avisos,
      ignorados: this.context.stats.ignorados,
      cancelado,
      tempoProcessamento: (fim - this.context.stats.inicio) / 1000,
      destino: this.descreverDestino(),
      resultados,
      erros
    };
  }

  /**
   * Registra o resultado do processamento
   */
  private logResultado(resultado: ETLResult<TItem, TSaida>): void {
    const { stats } = this.context;
    this.context.logger.info('='.repeat(60));
    this.context.logger.info('📊 RESULTADO DO PROCESSAMENTO');
    this.context.logger.info('='.repeat(60));
    this.context.logger.info(`✅ Sucessos: ${resultado.sucessos}`);
    this.context.logger.info(`❌ Falhas: ${resultado.falhas}`);
    this.context.logger.info(`⚠️  Avisos: ${resultado.avisos}`);
    if (resultado.ignorados > 0) {
      this.context.logger.info(`⏭️  Não iniciados: ${resultado.ignorados}`);
    }
    this.context.logger.info(`⏱️  Tempo total: ${resultado.tempoProcessamento.toFixed(2)}s`);

    if (this.context.options.verbose) {
      this.context.logger.info('📈 Detalhamento por etapa:');
      for (const etapa of ['validacao', 'extracao', 'transformacao', 'carregamento'] as const) {
        const contador = stats[etapa];
        this.context.logger.info(`   - ${etapa}: ${contador.sucesso}/${contador.total} (falhas: ${contador.falha})`);
      }
    }

    this.context.logger.info(`💾 Destino: ${resultado.destino}`);
    this.context.logger.info('='.repeat(60));
  }

  /**
   * Validação comum de parâmetros para todos os processadores
   */
  protected validateCommonParams(): ValidationResult {
    const erros: string[] = [];
    const avisos: string[] = [];
    const { options } = this.context;

    if (options.limite !== undefined && (!Number.isInteger(options.limite) || options.limite <= 0)) {
      erros.push('Limite deve ser maior que zero');
    }

    if (!Number.isInteger(this.concorrencia()) || this.concorrencia() <= 0) {
      erros.push('Concorrência deve ser maior que zero');
    }

    if (options.tentativas !== undefined && (!Number.isInteger(options.tentativas) || options.tentativas < 1)) {
      erros.push('Tentativas deve ser pelo menos 1');
    }

    if (options.timeout !== undefined && options.timeout <= 0) {
      erros.push('Timeout deve ser maior que zero');
    }

    if (!options.dryRun && options.destino.length === 0) {
      erros.push('Nenhum destino de armazenamento selecionado');
    }

    if (options.destino.includes('emulator') && !process.env.FIRESTORE_EMULATOR_HOST) {
      avisos.push(`FIRESTORE_EMULATOR_HOST não configurado, usando ${this.context.config.firestore.emulatorHost}`);
    }

    return {
      valido: erros.length === 0,
      erros,
      avisos
    };
  }

  /**
   * Incrementa contador de avisos
   */
  protected incrementWarnings(count: number = 1): void {
    this.context.stats.avisos += count;
  }

  /**
   * Estatísticas acumuladas até o momento
   */
  getStats(): ProcessingStats {
    return this.context.stats;
  }

  protected logDoItem(item: TItem): LoggerEmpresa {
    return this.context.logger.paraEmpresa(this.descreverItem(item));
  }

  /**
   * Métodos abstratos que devem ser implementados pelas subclasses
   */

  protected abstract getProcessName(): string;

  /**
   * Valida as opções antes de processar qualquer item
   */
  abstract validate(): Promise<ValidationResult>;

  /**
   * Itens a processar, já com o limite aplicado
   */
  protected abstract listarItens(): TItem[];

  /**
   * Nome usado nos logs do item
   */
  protected abstract descreverItem(item: TItem): string;

  /**
   * Chave de idempotência do item no destino
   */
  protected abstract chaveDoItem(item: TItem): string;

  /**
   * Valida e normaliza o item; lança para rejeitá-lo antes da extração
   */
  protected abstract validarItem(item: TItem): TItem;

  protected abstract extrair(item: TItem): Promise<TExtraido>;

  protected abstract transformar(item: TItem, dados: TExtraido): Promise<TSaida>;

  protected abstract carregar(item: TItem, saida: TSaida): Promise<void>;
}
