/**
 * Cliente HTTP para download das páginas das empresas
 *
 * Nunca lança erro para quem chama: qualquer falha (URL inválida, rede,
 * timeout, status fora de 2xx) volta como um `ResultadoDownload` com
 * `ok: false`. Não há retry aqui; quem chama decide se tenta de novo.
 */

import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import * as https from 'https';
import { logger, DownloadError, descreverErro } from '../logging/index.js';
import type { LoggerEmpresa } from '../logging/index.js';
import { etlConfig } from '../../../../../config/index.js';

export interface OpcoesClienteHttp {
  timeout?: number;
  userAgent?: string;
  verifySsl?: boolean;
  /** Substitui o transporte do axios (usado nos testes) */
  adapter?: AxiosAdapter;
}

export interface OpcoesDownload {
  headers?: Record<string, string>;
  /** Tempo máximo em milissegundos */
  timeout?: number;
  log?: LoggerEmpresa;
}

export type ResultadoDownload =
  | { ok: true; url: string; status: number; html: string; duracaoMs: number }
  | { ok: false; url: string; erro: DownloadError; duracaoMs: number };

const CODIGOS_TIMEOUT = ['ECONNABORTED', 'ETIMEDOUT'];

export class ClienteHttpScraper {
  private client: AxiosInstance;
  private readonly timeout: number;

  constructor(opcoes: OpcoesClienteHttp = {}) {
    this.timeout = opcoes.timeout ?? etlConfig.scraper.timeout;
    const verifySsl = opcoes.verifySsl ?? etlConfig.scraper.verifySsl;

    this.client = axios.create({
      timeout: this.timeout,
      responseType: 'text',
      // O status é avaliado em baixarHtml para virar um resultado, não uma exceção
      validateStatus: () => true,
      httpsAgent: verifySsl ? undefined : new https.Agent({ rejectUnauthorized: false }),
      adapter: opcoes.adapter,
      headers: {
        'Accept': 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'pt-BR,pt;q=0.9,en;q=0.5',
        'User-Agent': opcoes.userAgent ?? etlConfig.scraper.userAgent
      }
    });
  }

  /**
   * Baixa o HTML de uma URL absoluta
   */
  async baixarHtml(url: string, opcoes: OpcoesDownload = {}): Promise<ResultadoDownload> {
    const log = opcoes.log ?? logger.paraEmpresa(null);
    const inicio = Date.now();

    const falha = (erro: DownloadError): ResultadoDownload => {
      log.error(`Falha no download de ${url}: ${erro.message}`);
      return { ok: false, url, erro, duracaoMs: Date.now() - inicio };
    };

    if (!urlValida(url)) {
      return falha(new DownloadError('URL inválida: informe um endereço http(s) absoluto', url));
    }

    const timeout = opcoes.timeout ?? this.timeout;
    log.info(`Iniciando download de: ${url}`);

    try {
      const resposta = await this.client.get<unknown>(url, {
        headers: opcoes.headers,
        timeout
      });

      if (resposta.status < 200 || resposta.status >= 300) {
        return falha(new DownloadError(`HTTP ${resposta.status}`, url, resposta.status));
      }

      if (typeof resposta.data !== 'string') {
        return falha(new DownloadError('Resposta sem conteúdo textual', url, resposta.status));
      }

      const duracaoMs = Date.now() - inicio;
      log.info(`Download concluído: ${url} (status ${resposta.status}, ${duracaoMs}ms)`);
      return { ok: true, url, status: resposta.status, html: resposta.data, duracaoMs };

    } catch (error) {
      return falha(this.converterErro(error, url, timeout));
    }
  }

  private converterErro(error: unknown, url: string, timeout: number): DownloadError {
    if (axios.isAxiosError(error)) {
      const code = error.code;
      const mensagem = code && CODIGOS_TIMEOUT.includes(code)
        ? `Timeout após ${timeout}ms`
        : error.message || 'Erro de rede';
      return new DownloadError(mensagem, url, error.response?.status, code, error);
    }
    return new DownloadError(descreverErro(error), url, undefined, undefined, error);
  }
}

function urlValida(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}
