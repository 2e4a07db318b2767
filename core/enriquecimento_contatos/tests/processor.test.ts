import { describe, it, expect } from 'vitest';
import type { InternalAxiosRequestConfig } from 'axios';
import { EnriquecimentoContatosProcessor } from '../scripts/processors/enriquecimento-contatos.processor.js';
import { ClienteHttpScraper } from '../scripts/utils/api/client.js';
import { ProcessingStatus } from '../scripts/types/index.js';
import type { ContatosExtraidos, EmpresaAlvo, ETLOptions, RegistroContatos } from '../scripts/types/index.js';
import { etlConfig } from '../../../config/index.js';
import type { ETLConfig } from '../../../config/index.js';
import { adaptadorDePaginas, resposta } from './helpers/http.js';
import { RepositorioMemoria } from './helpers/repositorios.js';

/**
 * Repositório que demora a gravar e registra quantas gravações ficaram
 * abertas ao mesmo tempo, no total e por CNPJ
 */
class RepositorioLento extends RepositorioMemoria {
  private ativas = 0;
  private readonly ativasPorCnpj = new Map<string, number>();
  pico = 0;
  readonly picoPorCnpj = new Map<string, number>();

  async salvar(cnpj: string, razaoSocial: string, contatos: ContatosExtraidos): Promise<RegistroContatos> {
    this.ativas++;
    const ativasDoCnpj = (this.ativasPorCnpj.get(cnpj) ?? 0) + 1;
    this.ativasPorCnpj.set(cnpj, ativasDoCnpj);
    this.pico = Math.max(this.pico, this.ativas);
    this.picoPorCnpj.set(cnpj, Math.max(this.picoPorCnpj.get(cnpj) ?? 0, ativasDoCnpj));

    await new Promise(resolve => setTimeout(resolve, 20));

    this.ativas--;
    this.ativasPorCnpj.set(cnpj, ativasDoCnpj - 1);
    return super.salvar(cnpj, razaoSocial, contatos);
  }
}

const config: ETLConfig = {
  ...etlConfig,
  scraper: { ...etlConfig.scraper, pauseBetweenBatches: 0, maxRetries: 1, retryDelay: 1 }
};

const PAGINA_A = '<p>WhatsApp: (11) 99999-9999</p><a href="mailto:contato@a.example.com">e-mail</a>';
const PAGINA_B = '<p>Tel: (21) 3333-4444</p>';

const EMPRESA_A: EmpresaAlvo = { cnpj: '11.222.333/0001-81', razaoSocial: 'Empresa A', url: 'https://a.example.com' };
const EMPRESA_B: EmpresaAlvo = { cnpj: '22333444000192', razaoSocial: 'Empresa B', url: 'https://b.example.com' };

function opcoes(empresas: EmpresaAlvo[], extras: Partial<ETLOptions> = {}): ETLOptions {
  return { empresas, destino: ['postgres'], concorrencia: 2, ...extras };
}

function criar(
  options: ETLOptions,
  paginas: Record<string, string>,
  repositorios = [new RepositorioMemoria()]
) {
  const { adapter, chamadas } = adaptadorDePaginas(paginas);
  const processor = new EnriquecimentoContatosProcessor(options, {
    repositorios,
    cliente: new ClienteHttpScraper({ adapter }),
    config
  });
  return { processor, chamadas, repositorios };
}

describe('EnriquecimentoContatosProcessor', () => {
  it('extrai e grava os contatos de cada empresa pelo CNPJ normalizado', async () => {
    const repositorio = new RepositorioMemoria();
    const { processor } = criar(
      opcoes([EMPRESA_A, EMPRESA_B]),
      { 'https://a.example.com': PAGINA_A, 'https://b.example.com': PAGINA_B },
      [repositorio]
    );

    const resultado = await processor.process();

    expect(resultado.sucessos).toBe(2);
    expect(resultado.falhas).toBe(0);
    expect(resultado.cancelado).toBe(false);
    expect(resultado.destino).toBe('postgres');
    expect([...repositorio.registros.keys()].sort()).toEqual(['11222333000181', '22333444000192']);

    const registroA = repositorio.registros.get('11222333000181');
    expect(registroA?.razaoSocial).toBe('Empresa A');
    expect(registroA?.contatos.whatsapp).toBe('https://api.whatsapp.com/send?phone=5511999999999');
    expect(registroA?.contatos.emails).toEqual(['contato@a.example.com']);
    expect(repositorio.registros.get('22333444000192')?.contatos.telefones).toEqual(['2133334444']);
  });

  it('segue para a próxima empresa quando um site não responde', async () => {
    const fora: EmpresaAlvo = { cnpj: '33444555000103', razaoSocial: 'Fora do Ar', url: 'https://fora-do-ar.example.com' };
    const repositorio = new RepositorioMemoria();
    const { processor } = criar(opcoes([fora, EMPRESA_B]), { 'https://b.example.com': PAGINA_B }, [repositorio]);

    const resultado = await processor.process();

    expect(resultado.sucessos).toBe(1);
    expect(resultado.falhas).toBe(1);
    const [primeiro] = resultado.resultados;
    expect(primeiro.status).toBe('falha');
    if (primeiro.status === 'falha') {
      expect(primeiro.etapa).toBe('extracao');
      expect(primeiro.erro.codigo).toBe('DownloadError');
      expect(primeiro.erro.mensagem).toBe('connect ECONNREFUSED https://fora-do-ar.example.com');
    }
    expect(repositorio.gravacoes).toEqual(['22333444000192']);

    const stats = processor.getStats();
    expect(stats.processados).toBe(2);
    expect(stats.extracao).toEqual({ total: 2, sucesso: 1, falha: 1 });
    expect(stats.carregamento).toEqual({ total: 1, sucesso: 1, falha: 0 });
  });

  it('rejeita CNPJ e URL inválidos antes do download', async () => {
    const { processor, chamadas, repositorios } = criar(
      opcoes([
        { cnpj: '000', razaoSocial: 'Zerada', url: 'https://zerada.example.com' },
        { cnpj: '44555666000170', razaoSocial: 'Sem URL', url: 'site sem protocolo' }
      ]),
      {}
    );

    const resultado = await processor.process();

    expect(resultado.falhas).toBe(2);
    expect(chamadas).toEqual([]);
    expect(repositorios[0].gravacoes).toEqual([]);
    expect(resultado.resultados.map(r => (r.status === 'falha' ? [r.etapa, r.erro.codigo] : null))).toEqual([
      ['validacao', 'ValidacaoError'],
      ['validacao', 'ValidacaoError']
    ]);
    expect(resultado.erros[0].mensagem).toBe('CNPJ inválido: "000"');
  });

  it('sobrescreve o registro ao processar a mesma empresa de novo', async () => {
    const repositorio = new RepositorioMemoria();
    const empresa: EmpresaAlvo = { cnpj: '12345678000199', razaoSocial: 'Empresa X', url: 'https://x.example.com' };

    await criar(opcoes([empresa]), { 'https://x.example.com': '<p>old@x.com</p>' }, [repositorio]).processor.process();
    await criar(opcoes([empresa]), { 'https://x.example.com': '<p>new@x.com</p>' }, [repositorio]).processor.process();

    expect(repositorio.registros.get('12345678000199')?.contatos.emails).toEqual(['new@x.com']);
  });

  it('marca a empresa como falha de persistência quando um destino falha', async () => {
    const ok = new RepositorioMemoria('pc');
    const quebrado = new RepositorioMemoria('postgres');
    quebrado.falha = new Error('disco cheio');
    const { processor } = criar(opcoes([EMPRESA_B]), { 'https://b.example.com': PAGINA_B }, [ok, quebrado]);

    const resultado = await processor.process();

    expect(resultado.falhas).toBe(1);
    const [desfecho] = resultado.resultados;
    expect(desfecho.status === 'falha' && desfecho.etapa).toBe('carregamento');
    expect(resultado.erros[0].codigo).toBe('PersistenciaError');
    expect(resultado.erros[0].mensagem).toBe('Falha ao salvar contatos de 22.333.444/0001-92 (postgres: disco cheio)');
    expect(ok.gravacoes).toEqual(['22333444000192']);
  });

  it('não grava nada em dry-run', async () => {
    const { processor, repositorios } = criar(
      opcoes([EMPRESA_B], { dryRun: true }),
      { 'https://b.example.com': PAGINA_B }
    );

    const resultado = await processor.process();

    expect(resultado.sucessos).toBe(1);
    expect(resultado.destino).toBe('dry-run');
    expect(resultado.resultados[0]).toMatchObject({ status: 'sucesso', persistido: false });
    expect(repositorios[0].gravacoes).toEqual([]);
  });

  it('respeita o limite de empresas', async () => {
    const { processor, chamadas } = criar(
      opcoes([EMPRESA_A, EMPRESA_B], { limite: 1 }),
      { 'https://a.example.com': PAGINA_A, 'https://b.example.com': PAGINA_B }
    );

    const resultado = await processor.process();

    expect(resultado.resultados).toHaveLength(1);
    expect(chamadas).toEqual(['https://a.example.com']);
  });

  it('não inicia novas empresas depois do cancelamento', async () => {
    const controller = new AbortController();
    const repositorio = new RepositorioMemoria();
    const adapter = async (requisicao: InternalAxiosRequestConfig) => {
      controller.abort();
      return resposta(requisicao, 200, PAGINA_B);
    };
    const processor = new EnriquecimentoContatosProcessor(
      opcoes(
        [EMPRESA_B, EMPRESA_A, { cnpj: '55666777000158', razaoSocial: 'Empresa C', url: 'https://c.example.com' }],
        { concorrencia: 1, signal: controller.signal }
      ),
      { repositorios: [repositorio], cliente: new ClienteHttpScraper({ adapter }), config }
    );
    const eventos: ProcessingStatus[] = [];
    processor.onProgress(evento => eventos.push(evento.status));

    const resultado = await processor.process();

    expect(eventos).toEqual([ProcessingStatus.INICIADO, ProcessingStatus.EXTRAINDO, ProcessingStatus.CANCELADO]);
    expect(resultado.cancelado).toBe(true);
    expect(resultado.sucessos).toBe(1);
    expect(resultado.ignorados).toBe(2);
    expect(repositorio.gravacoes).toEqual(['22333444000192']);
  });

  it('tenta de novo erros temporários quando há mais de uma tentativa', async () => {
    let chamadas = 0;
    const adapter = async (requisicao: InternalAxiosRequestConfig) => {
      chamadas++;
      return chamadas === 1 ? resposta(requisicao, 503, 'indisponível') : resposta(requisicao, 200, PAGINA_B);
    };
    const processor = new EnriquecimentoContatosProcessor(
      opcoes([EMPRESA_B], { tentativas: 2 }),
      { repositorios: [new RepositorioMemoria()], cliente: new ClienteHttpScraper({ adapter }), config }
    );

    const resultado = await processor.process();

    expect(resultado.sucessos).toBe(1);
    expect(chamadas).toBe(2);
  });

  it('não repete downloads com erro definitivo', async () => {
    let chamadas = 0;
    const adapter = async (requisicao: InternalAxiosRequestConfig) => {
      chamadas++;
      return resposta(requisicao, 404, 'não encontrado');
    };
    const processor = new EnriquecimentoContatosProcessor(
      opcoes([EMPRESA_B], { tentativas: 3 }),
      { repositorios: [new RepositorioMemoria()], cliente: new ClienteHttpScraper({ adapter }), config }
    );

    const resultado = await processor.process();

    expect(resultado.falhas).toBe(1);
    expect(resultado.erros[0].mensagem).toBe('HTTP 404');
    expect(chamadas).toBe(1);
  });

  it('falha a execução inteira quando as opções são inválidas', async () => {
    const { processor } = criar({ empresas: [EMPRESA_B], destino: [] }, {}, []);

    const resultado = await processor.process();

    expect(resultado.sucessos).toBe(0);
    expect(resultado.falhas).toBe(1);
    expect(resultado.erros[0].codigo).toBe('ETL_ERROR');
    expect(resultado.erros[0].mensagem).toBe(
      'Validação falhou: Nenhum destino de armazenamento selecionado, Nenhum repositório disponível para os destinos selecionados'
    );
  });

  it('grava uma empresa por vez quando o mesmo CNPJ aparece duas vezes no lote', async () => {
    const repositorio = new RepositorioLento();
    const mascarado: EmpresaAlvo = { cnpj: '12.345.678/0001-99', razaoSocial: 'Empresa X', url: 'https://x.example.com' };
    const semMascara: EmpresaAlvo = { ...mascarado, cnpj: '12345678000199' };
    const { processor } = criar(
      opcoes([mascarado, semMascara, EMPRESA_B], { concorrencia: 3 }),
      { 'https://x.example.com': '<p>contato@x.example.com</p>', 'https://b.example.com': PAGINA_B },
      [repositorio]
    );

    const resultado = await processor.process();

    expect(resultado.sucessos).toBe(3);
    expect([...repositorio.gravacoes].sort()).toEqual(['12345678000199', '12345678000199', '22333444000192']);
    expect(repositorio.picoPorCnpj.get('12345678000199')).toBe(1);
    expect(repositorio.pico).toBe(2);
  });

  it('emite o evento de erro quando a execução não pode começar', async () => {
    const { processor } = criar({ empresas: [EMPRESA_B], destino: [] }, {}, []);
    const eventos: ProcessingStatus[] = [];
    processor.onProgress(evento => eventos.push(evento.status));

    await processor.process();

    expect(eventos).toEqual([ProcessingStatus.INICIADO, ProcessingStatus.ERRO]);
  });

  it('emite eventos de progresso', async () => {
    const { processor } = criar(opcoes([EMPRESA_B]), { 'https://b.example.com': PAGINA_B });
    const eventos: ProcessingStatus[] = [];
    processor.onProgress(evento => eventos.push(evento.status));

    await processor.process();

    expect(eventos).toEqual([ProcessingStatus.INICIADO, ProcessingStatus.EXTRAINDO, ProcessingStatus.FINALIZADO]);
  });
});
