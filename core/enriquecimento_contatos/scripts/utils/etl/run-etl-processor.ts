/**
 * Executor Genérico de ETL
 *
 * Centraliza o fluxo comum aos scripts initiators: leitura dos argumentos,
 * validação da configuração, criação dos repositórios, execução do
 * processador, resumo final e encerramento das conexões.
 */

import { etlConfig, validateETLConfig } from '../../../../../config/index.js';
import type { ETLConfig } from '../../../../../config/index.js';
import { criarRepositorios as criarRepositoriosPadrao } from '../../carregamento/index.js';
import type { RepositorioContatos } from '../../carregamento/index.js';
import { logger, descreverErro } from '../logging/index.js';
import type { Destino, ETLOptions, ETLResult } from '../../types/index.js';

/** Código de saída quando a execução é interrompida por SIGINT */
export const EXIT_CODE_INTERROMPIDO = 130;

/**
 * Interface base que todos os processadores devem implementar
 */
export interface IProcessor {
  process(): Promise<ETLResult<unknown, unknown>>;
}

export interface ParserLinhaComando {
  parse(argv?: string[]): Promise<ETLOptions>;
}

/**
 * Configuração para o executor ETL
 */
export interface EtlRunnerConfig<T extends IProcessor> {
  criarProcessador: (options: ETLOptions, repositorios: RepositorioContatos[]) => T;
  cliParser: ParserLinhaComando;
  scriptName: string;
  argv?: string[];
  config?: ETLConfig;
  criarRepositorios?: (destinos: readonly Destino[], config: ETLConfig) => RepositorioContatos[];
  onSuccess?: (result: ETLResult<unknown, unknown>) => void;
}

/**
 * Logs padronizados de início de processamento
 */
function logProcessingStart(scriptName: string, options: ETLOptions): void {
  logger.info('📇 Sistema ETL - Enriquecimento de Contatos');
  logger.info(`🔷 Processador: ${scriptName}`);
  logger.info(`🏢 Empresas: ${options.empresas.length}`);

  if (options.limite) {
    logger.info(`🎯 Limite: ${options.limite}`);
  }

  if (options.verbose) {
    logger.info('📝 Modo verbose: ativado');
  }

  if (options.dryRun) {
    logger.info('🔍 Modo dry-run: ativado (nenhum dado será salvo)');
  }

  logger.info(`💾 Destino: ${options.destino.join(', ')}`);
  logger.info('⏳ Iniciando processamento...');
}

/**
 * Logs padronizados de resultado final
 */
function logProcessingResult(result: ETLResult<unknown, unknown>, scriptName: string): void {
  logger.info('📋 RESUMO DO PROCESSAMENTO:');
  logger.info('═'.repeat(50));
  logger.info(`🎯 Script: ${scriptName}`);
  logger.info(`⏱️ Tempo Total: ${result.tempoProcessamento.toFixed(2)}s`);
  logger.info(`💾 Destino: ${result.destino}`);
  logger.info(`📊 Total Processados: ${result.resultados.length}`);
  logger.info(`✅ Sucessos: ${result.sucessos}`);

  if (result.falhas > 0) {
    logger.warn(`❌ Falhas: ${result.falhas}`);
    result.erros.forEach(erro => logger.warn(`   - ${erro.codigo}: ${erro.mensagem}`));
  }

  logger.info('═'.repeat(50));

  if (result.cancelado) {
    logger.warn('🚫 Processamento interrompido antes do fim.');
  } else if (result.falhas === 0) {
    logger.info('🎉 Processamento concluído com sucesso!');
  } else {
    logger.warn('⚠️ Processamento concluído com algumas falhas.');
  }
}

async function encerrarRepositorios(repositorios: RepositorioContatos[]): Promise<void> {
  const encerramentos = await Promise.allSettled(repositorios.map(repositorio => repositorio.encerrar()));
  encerramentos.forEach((encerramento, indice) => {
    if (encerramento.status === 'rejected') {
      logger.warn(`Erro ao encerrar ${repositorios[indice].nome}: ${descreverErro(encerramento.reason)}`);
    }
  });
}

/**
 * Executor principal que unifica toda a lógica de ETL
 *
 * @returns Código de saída: 0 sem falhas, 1 se alguma empresa falhou ou a
 * execução não pôde começar, 130 se foi interrompida.
 */
export async function runEtlProcessor<T extends IProcessor>(
  config: EtlRunnerConfig<T>
): Promise<number> {
  const startTime = Date.now();
  const controller = new AbortController();
  const etl = config.config ?? etlConfig;
  const criarRepositorios = config.criarRepositorios ?? criarRepositoriosPadrao;
  let repositorios: RepositorioContatos[] = [];

  const onSigint = (): void => {
    if (!controller.signal.aborted) {
      logger.warn('🛑 Interrupção solicitada: nenhuma nova empresa será iniciada');
      controller.abort();
    }
  };
  process.on('SIGINT', onSigint);

  try {
    // 1. Argumentos e configuração
    const options: ETLOptions = { ...(await config.cliParser.parse(config.argv)), signal: controller.signal };
    validateETLConfig(etl);

    // 2. Repositórios dos destinos selecionados
    repositorios = options.dryRun ? [] : criarRepositorios(options.destino, etl);
    await Promise.all(repositorios.map(repositorio => repositorio.inicializar()));

    // 3. Processamento
    logProcessingStart(config.scriptName, options);
    const processor = config.criarProcessador(options, repositorios);
    const resultado = await processor.process();
    resultado.tempoProcessamento = (Date.now() - startTime) / 1000;

    logProcessingResult(resultado, config.scriptName);

    if (config.onSuccess) {
      config.onSuccess(resultado);
    }

    if (resultado.falhas > 0) {
      return 1;
    }
    return resultado.cancelado ? EXIT_CODE_INTERROMPIDO : 0;

  } catch (error) {
    const duration = (Date.now() - startTime) / 1000;

    logger.error('❌ ERRO FATAL NO PROCESSAMENTO:');
    logger.error('═'.repeat(50));
    logger.error(`🎯 Script: ${config.scriptName}`);
    logger.error(`⏱️ Tempo até erro: ${duration.toFixed(2)}s`);
    logger.error(`💥 Erro: ${descreverErro(error)}`);

    if (error instanceof Error && error.stack && (process.env.DEBUG || process.env.NODE_ENV === 'development')) {
      logger.error(`🔍 Stack trace: ${error.stack}`);
    }

    logger.error('═'.repeat(50));
    return 1;

  } finally {
    process.off('SIGINT', onSigint);
    await encerrarRepositorios(repositorios);
  }
}
