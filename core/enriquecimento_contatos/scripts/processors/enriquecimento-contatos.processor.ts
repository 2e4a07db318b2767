/**
 * Processador de enriquecimento de contatos
 *
 * Para cada empresa: valida CNPJ e URL, baixa a página, extrai os contatos e
 * grava o registro em todos os destinos configurados.
 */

import { ETLProcessor } from '../core/etl-processor.js';
import { ClienteHttpScraper } from '../utils/api/client.js';
import { extrairContatosEstrategicos } from '../transformacao/contatos.js';
import { EXTRATORES_PADRAO } from '../extracao/index.js';
import type { ExtratorContatos } from '../extracao/index.js';
import type { RepositorioContatos } from '../carregamento/index.js';
import { normalizarCnpj, formatarCnpj } from '../utils/formatters.js';
import {
  PersistenciaError,
  ValidacaoError,
  descreverErro,
  withRetry
} from '../utils/logging/index.js';
import { etlConfig } from '../../../../config/index.js';
import type { ETLConfig } from '../../../../config/index.js';
import type {
  ContatosExtraidos,
  EmpresaAlvo,
  ETLOptions,
  ValidationResult
} from '../types/index.js';

interface PaginaBaixada {
  url: string;
  html: string;
}

export interface DependenciasEnriquecimento {
  repositorios: RepositorioContatos[];
  cliente?: ClienteHttpScraper;
  extratores?: readonly ExtratorContatos[];
  config?: ETLConfig;
}

function urlHttpValida(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

export class EnriquecimentoContatosProcessor extends ETLProcessor<EmpresaAlvo, PaginaBaixada, ContatosExtraidos> {
  private readonly cliente: ClienteHttpScraper;
  private readonly repositorios: RepositorioContatos[];
  private readonly extratores: readonly ExtratorContatos[];

  constructor(options: ETLOptions, dependencias: DependenciasEnriquecimento) {
    const config = dependencias.config ?? etlConfig;
    super(options, config);

    this.repositorios = dependencias.repositorios;
    this.extratores = dependencias.extratores ?? EXTRATORES_PADRAO;
    this.cliente = dependencias.cliente ?? new ClienteHttpScraper({
      timeout: options.timeout ?? config.scraper.timeout,
      userAgent: config.scraper.userAgent,
      verifySsl: config.scraper.verifySsl
    });
  }

  protected getProcessName(): string {
    return 'Processador de Enriquecimento de Contatos';
  }

  async validate(): Promise<ValidationResult> {
    const validacao = this.validateCommonParams();

    if (this.context.options.empresas.length === 0) {
      validacao.avisos.push('Nenhuma empresa informada para processamento');
    }

    if (!this.context.options.dryRun && this.repositorios.length === 0) {
      validacao.erros.push('Nenhum repositório disponível para os destinos selecionados');
    }

    return { ...validacao, valido: validacao.erros.length === 0 };
  }

  protected listarItens(): EmpresaAlvo[] {
    const { empresas, limite } = this.context.options;
    return limite !== undefined ? empresas.slice(0, limite) : [...empresas];
  }

  protected descreverItem(empresa: EmpresaAlvo): string {
    return empresa.razaoSocial || formatarCnpj(empresa.cnpj);
  }

  protected chaveDoItem(empresa: EmpresaAlvo): string {
    return empresa.cnpj;
  }

  protected validarItem(empresa: EmpresaAlvo): EmpresaAlvo {
    const cnpj = normalizarCnpj(empresa.cnpj);
    if (!cnpj) {
      throw new ValidacaoError(`CNPJ inválido: "${empresa.cnpj}"`, 'cnpj');
    }

    const url = empresa.url.trim();
    if (!urlHttpValida(url)) {
      throw new ValidacaoError(`URL inválida para ${formatarCnpj(cnpj)}: "${empresa.url}"`, 'url');
    }

    return { ...empresa, cnpj, url, razaoSocial: empresa.razaoSocial.trim() };
  }

  protected async extrair(empresa: EmpresaAlvo): Promise<PaginaBaixada> {
    const log = this.logDoItem(empresa);
    const tentativas = this.context.options.tentativas ?? this.context.config.scraper.maxRetries;

    const baixar = async (): Promise<PaginaBaixada> => {
      const resultado = await this.cliente.baixarHtml(empresa.url, {
        timeout: this.context.options.timeout,
        log
      });
      if (!resultado.ok) {
        throw resultado.erro;
      }
      return { url: resultado.url, html: resultado.html };
    };

    if (tentativas <= 1) {
      return baixar();
    }

    return withRetry(
      baixar,
      tentativas,
      this.context.config.scraper.retryDelay,
      `Download ${empresa.url}`,
      undefined,
      log
    );
  }

  protected async transformar(empresa: EmpresaAlvo, pagina: PaginaBaixada): Promise<ContatosExtraidos> {
    return extrairContatosEstrategicos(pagina.html, {
      url: pagina.url,
      nomeEmpresa: this.descreverItem(empresa),
      redesSociais: empresa.redesSociais,
      extratores: this.extratores,
      log: this.logDoItem(empresa)
    });
  }

  protected async carregar(empresa: EmpresaAlvo, contatos: ContatosExtraidos): Promise<void> {
    const log = this.logDoItem(empresa);
    const gravacoes = await Promise.allSettled(
      this.repositorios.map(repositorio => repositorio.salvar(empresa.cnpj, empresa.razaoSocial, contatos))
    );

    const falhas: string[] = [];
    const destinosComFalha: string[] = [];
    gravacoes.forEach((gravacao, indice) => {
      const destino = this.repositorios[indice].nome;
      if (gravacao.status === 'fulfilled') {
        log.info(`Contatos de ${formatarCnpj(empresa.cnpj)} salvos em ${destino}`);
      } else {
        destinosComFalha.push(destino);
        falhas.push(`${destino}: ${descreverErro(gravacao.reason)}`);
      }
    });

    if (falhas.length > 0) {
      throw new PersistenciaError(
        `Falha ao salvar contatos de ${formatarCnpj(empresa.cnpj)} (${falhas.join('; ')})`,
        destinosComFalha.join(', ')
      );
    }
  }
}
