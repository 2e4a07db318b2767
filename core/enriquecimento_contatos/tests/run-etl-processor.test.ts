import { describe, it, expect } from 'vitest';
import { runEtlProcessor, EXIT_CODE_INTERROMPIDO } from '../scripts/utils/etl/run-etl-processor.js';
import type { IProcessor } from '../scripts/utils/etl/run-etl-processor.js';
import { EnriquecimentoContatosProcessor } from '../scripts/processors/enriquecimento-contatos.processor.js';
import { ClienteHttpScraper } from '../scripts/utils/api/client.js';
import type { ETLOptions, ETLResult } from '../scripts/types/index.js';
import { etlConfig } from '../../../config/index.js';
import type { ETLConfig } from '../../../config/index.js';
import { adaptadorDePaginas } from './helpers/http.js';
import { RepositorioMemoria } from './helpers/repositorios.js';

const config: ETLConfig = {
  ...etlConfig,
  scraper: { ...etlConfig.scraper, pauseBetweenBatches: 0, maxRetries: 1 }
};

const OPTIONS: ETLOptions = {
  empresas: [
    { cnpj: '22333444000192', razaoSocial: 'Empresa B', url: 'https://b.example.com' },
    { cnpj: '33444555000103', razaoSocial: 'Fora do Ar', url: 'https://fora.example.com' }
  ],
  destino: ['pc']
};

function parserFixo(options: ETLOptions) {
  return { parse: async () => options };
}

function resultadoVazio(parcial: Partial<ETLResult<unknown, unknown>>): ETLResult<unknown, unknown> {
  return {
    sucessos: 0,
    falhas: 0,
    avisos: 0,
    ignorados: 0,
    cancelado: false,
    tempoProcessamento: 0,
    destino: 'pc',
    resultados: [],
    erros: [],
    ...parcial
  };
}

describe('runEtlProcessor', () => {
  it('executa o processador, encerra os repositórios e retorna 1 se alguma empresa falhou', async () => {
    const repositorio = new RepositorioMemoria('pc');
    const { adapter } = adaptadorDePaginas({ 'https://b.example.com': '<p>Tel: (21) 3333-4444</p>' });

    const codigo = await runEtlProcessor({
      cliParser: parserFixo(OPTIONS),
      scriptName: 'teste',
      config,
      criarRepositorios: () => [repositorio],
      criarProcessador: (options, repositorios) => new EnriquecimentoContatosProcessor(options, {
        repositorios,
        cliente: new ClienteHttpScraper({ adapter }),
        config
      })
    });

    expect(codigo).toBe(1);
    expect(repositorio.gravacoes).toEqual(['22333444000192']);
    expect(repositorio.encerrado).toBe(true);
  });

  it('retorna 0 quando todas as empresas são processadas', async () => {
    const codigo = await runEtlProcessor({
      cliParser: parserFixo(OPTIONS),
      scriptName: 'teste',
      config,
      criarRepositorios: () => [],
      criarProcessador: (): IProcessor => ({ process: async () => resultadoVazio({ sucessos: 2 }) })
    });

    expect(codigo).toBe(0);
  });

  it('retorna o código de interrupção quando a execução foi cancelada', async () => {
    const codigo = await runEtlProcessor({
      cliParser: parserFixo(OPTIONS),
      scriptName: 'teste',
      config,
      criarRepositorios: () => [],
      criarProcessador: (): IProcessor => ({ process: async () => resultadoVazio({ sucessos: 1, ignorados: 1, cancelado: true }) })
    });

    expect(codigo).toBe(EXIT_CODE_INTERROMPIDO);
  });

  it('entrega um sinal de cancelamento e escuta SIGINT só durante a execução', async () => {
    const antes = process.listenerCount('SIGINT');
    let sinal: AbortSignal | undefined;
    let durante = 0;

    await runEtlProcessor({
      cliParser: parserFixo(OPTIONS),
      scriptName: 'teste',
      config,
      criarRepositorios: () => [],
      criarProcessador: (options): IProcessor => {
        sinal = options.signal;
        durante = process.listenerCount('SIGINT');
        return { process: async () => resultadoVazio({}) };
      }
    });

    expect(sinal).toBeInstanceOf(AbortSignal);
    expect(durante).toBe(antes + 1);
    expect(process.listenerCount('SIGINT')).toBe(antes);
  });

  it('não cria repositórios em dry-run', async () => {
    let criados = false;
    await runEtlProcessor({
      cliParser: parserFixo({ ...OPTIONS, dryRun: true }),
      scriptName: 'teste',
      config,
      criarRepositorios: () => {
        criados = true;
        return [];
      },
      criarProcessador: (): IProcessor => ({ process: async () => resultadoVazio({}) })
    });

    expect(criados).toBe(false);
  });

  it('retorna 1 com configuração inválida, sem processar', async () => {
    let processou = false;
    const codigo = await runEtlProcessor({
      cliParser: parserFixo(OPTIONS),
      scriptName: 'teste',
      config: { ...config, scraper: { ...config.scraper, concurrency: 0 } },
      criarRepositorios: () => [],
      criarProcessador: (): IProcessor => {
        processou = true;
        return { process: async () => resultadoVazio({}) };
      }
    });

    expect(codigo).toBe(1);
    expect(processou).toBe(false);
  });

  it('retorna 1 quando os argumentos são inválidos', async () => {
    const codigo = await runEtlProcessor({
      cliParser: { parse: async () => { throw new Error('argumentos inválidos'); } },
      scriptName: 'teste',
      criarProcessador: (): IProcessor => ({ process: async () => resultadoVazio({}) })
    });

    expect(codigo).toBe(1);
  });
});
