/**
 * Armazenamento local em JSON (destino "pc")
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import { PersistenciaError, descreverErro, logger } from '../utils/logging/index.js';
import type { LoggerEmpresa } from '../utils/logging/index.js';
import type { ContatosExtraidos, RegistroContatos } from '../types/index.js';
import { lerContatos, textoOuNulo } from './repositorio.js';
import type { RepositorioContatos } from './repositorio.js';

interface RegistroArquivo extends ContatosExtraidos {
  cnpj: string;
  razao_social: string;
  ultima_atualizacao: string;
}

type ConteudoArquivo = Record<string, RegistroArquivo>;

function codigoDoErro(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Escreve em um arquivo temporário ao lado do destino e troca pelo rename,
 * então o destino nunca fica com JSON pela metade.
 */
async function escreverJson(caminho: string, conteudo: unknown): Promise<void> {
  await fs.mkdir(path.dirname(caminho), { recursive: true });
  const temporario = `${caminho}.tmp`;
  await fs.writeFile(temporario, JSON.stringify(conteudo, null, 4), 'utf8');
  await fs.rename(temporario, caminho);
}

/**
 * Grava um único registro de contatos em um arquivo JSON, criando as pastas
 */
export async function salvarContatosEmArquivo(
  contatos: ContatosExtraidos,
  caminho: string,
  log: LoggerEmpresa = logger.paraEmpresa(null)
): Promise<void> {
  try {
    await escreverJson(caminho, contatos);
    log.info(`Contatos salvos em: ${caminho}`);
  } catch (error) {
    throw new PersistenciaError(
      `Erro ao salvar contatos em ${caminho}: ${descreverErro(error)}`,
      'pc',
      error
    );
  }
}

function registroDoArquivo(cnpj: string, bruto: unknown): RegistroContatos | null {
  if (typeof bruto !== 'object' || bruto === null || Array.isArray(bruto)) {
    return null;
  }

  const campos: Record<string, unknown> = { ...bruto };
  const data = new Date(textoOuNulo(campos.ultima_atualizacao) ?? 0);
  return {
    cnpj,
    razaoSocial: textoOuNulo(campos.razao_social) ?? '',
    contatos: lerContatos(campos),
    ultimaAtualizacao: Number.isNaN(data.getTime()) ? new Date(0) : data
  };
}

/**
 * Um único arquivo JSON com um objeto por CNPJ. As escritas são feitas uma
 * de cada vez para que lotes concorrentes não percam registros.
 */
export class RepositorioContatosArquivo implements RepositorioContatos {
  readonly nome = 'pc';
  private fila: Promise<void> = Promise.resolve();

  constructor(private readonly caminho: string) {}

  private emFila<T>(operacao: () => Promise<T>): Promise<T> {
    const execucao = this.fila.then(operacao);
    // A fila segue adiante mesmo se a operação falhar; o erro fica com quem chamou
    this.fila = execucao.then(() => undefined, () => undefined);
    return execucao;
  }

  private async ler(): Promise<Record<string, unknown>> {
    let texto: string;
    try {
      texto = await fs.readFile(this.caminho, 'utf8');
    } catch (error) {
      if (codigoDoErro(error) === 'ENOENT') {
        return {};
      }
      throw error;
    }

    const conteudo: unknown = JSON.parse(texto);
    if (typeof conteudo !== 'object' || conteudo === null || Array.isArray(conteudo)) {
      throw new Error(`Conteúdo de ${this.caminho} não é um objeto JSON`);
    }
    return { ...conteudo };
  }

  async inicializar(): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.caminho), { recursive: true });
      logger.info(`💾 Contatos serão salvos em: ${this.caminho}`);
    } catch (error) {
      throw new PersistenciaError(
        `Erro ao preparar pasta de ${this.caminho}: ${descreverErro(error)}`,
        this.nome,
        error
      );
    }
  }

  salvar(cnpj: string, razaoSocial: string, contatos: ContatosExtraidos): Promise<RegistroContatos> {
    return this.emFila(async () => {
      try {
        const conteudo = await this.ler();
        const ultimaAtualizacao = new Date();
        const registro: RegistroArquivo = {
          cnpj,
          razao_social: razaoSocial,
          ...contatos,
          ultima_atualizacao: ultimaAtualizacao.toISOString()
        };
        const atualizado: ConteudoArquivo = {};
        for (const [chave, valor] of Object.entries(conteudo)) {
          const existente = registroDoArquivo(chave, valor);
          if (existente) {
            atualizado[chave] = {
              cnpj: chave,
              razao_social: existente.razaoSocial,
              ...existente.contatos,
              ultima_atualizacao: existente.ultimaAtualizacao.toISOString()
            };
          }
        }
        atualizado[cnpj] = registro;
        await escreverJson(this.caminho, atualizado);

        return { cnpj, razaoSocial, contatos, ultimaAtualizacao };
      } catch (error) {
        throw new PersistenciaError(
          `Erro ao salvar contatos em ${this.caminho}: ${descreverErro(error)}`,
          this.nome,
          error
        );
      }
    });
  }

  buscar(cnpj: string): Promise<RegistroContatos | null> {
    return this.emFila(async () => {
      try {
        const conteudo = await this.ler();
        return registroDoArquivo(cnpj, conteudo[cnpj]);
      } catch (error) {
        throw new PersistenciaError(
          `Erro ao ler contatos de ${this.caminho}: ${descreverErro(error)}`,
          this.nome,
          error
        );
      }
    });
  }

  async encerrar(): Promise<void> {
    await this.fila;
  }
}
