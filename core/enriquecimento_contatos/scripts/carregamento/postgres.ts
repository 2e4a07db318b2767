/**
 * Repositório de contatos no PostgreSQL
 */
import { PersistenciaError, descreverErro, logger } from '../utils/logging/index.js';
import type { ExecutorSql } from '../utils/storage/postgres/config.js';
import type { ContatosExtraidos, RegistroContatos } from '../types/index.js';
import { lerContatos, textoOuNulo } from './repositorio.js';
import type { RepositorioContatos } from './repositorio.js';

const COLUNAS = 'cnpj, razao_social, telefones, whatsapp, emails, endereco, redes_sociais, data_atualizacao';

export function sqlCriarTabela(tabela: string): string {
  return `
    CREATE TABLE IF NOT EXISTS ${tabela} (
      id SERIAL PRIMARY KEY,
      cnpj VARCHAR(14) NOT NULL,
      razao_social VARCHAR(255),
      telefones JSONB NOT NULL DEFAULT '[]'::jsonb,
      whatsapp TEXT,
      emails JSONB NOT NULL DEFAULT '[]'::jsonb,
      endereco TEXT,
      redes_sociais JSONB NOT NULL DEFAULT '{}'::jsonb,
      data_atualizacao TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
      CONSTRAINT ${tabela}_cnpj_key UNIQUE (cnpj)
    )`;
}

export function sqlCriarIndice(tabela: string): string {
  return `CREATE INDEX IF NOT EXISTS idx_${tabela}_cnpj ON ${tabela} (cnpj)`;
}

/**
 * Upsert em um único comando: o registro existente é substituído por inteiro
 */
export function sqlUpsert(tabela: string): string {
  return `
    INSERT INTO ${tabela} (${COLUNAS})
    VALUES ($1, $2, $3::jsonb, $4, $5::jsonb, $6, $7::jsonb, CURRENT_TIMESTAMP)
    ON CONFLICT (cnpj) DO UPDATE SET
      razao_social = EXCLUDED.razao_social,
      telefones = EXCLUDED.telefones,
      whatsapp = EXCLUDED.whatsapp,
      emails = EXCLUDED.emails,
      endereco = EXCLUDED.endereco,
      redes_sociais = EXCLUDED.redes_sociais,
      data_atualizacao = CURRENT_TIMESTAMP
    RETURNING ${COLUNAS}`;
}

function lerData(valor: unknown): Date {
  if (valor instanceof Date) {
    return valor;
  }
  if (typeof valor === 'string' || typeof valor === 'number') {
    const data = new Date(valor);
    if (!Number.isNaN(data.getTime())) {
      return data;
    }
  }
  throw new Error(`Valor de data_atualizacao inválido: ${String(valor)}`);
}

function linhaParaRegistro(linha: Record<string, unknown>): RegistroContatos {
  const cnpj = textoOuNulo(linha.cnpj);
  if (!cnpj) {
    throw new Error('Linha retornada sem CNPJ');
  }

  return {
    cnpj,
    razaoSocial: textoOuNulo(linha.razao_social) ?? '',
    contatos: lerContatos(linha),
    ultimaAtualizacao: lerData(linha.data_atualizacao)
  };
}

export class RepositorioContatosPostgres implements RepositorioContatos {
  readonly nome = 'postgres';

  constructor(
    private readonly executor: ExecutorSql,
    private readonly tabela: string
  ) {}

  async inicializar(): Promise<void> {
    try {
      await this.executor.query(sqlCriarTabela(this.tabela));
      await this.executor.query(sqlCriarIndice(this.tabela));
      logger.debug(`Tabela ${this.tabela} verificada`);
    } catch (error) {
      throw new PersistenciaError(
        `Erro ao preparar a tabela ${this.tabela}: ${descreverErro(error)}`,
        this.nome,
        error
      );
    }
  }

  async salvar(cnpj: string, razaoSocial: string, contatos: ContatosExtraidos): Promise<RegistroContatos> {
    const valores = [
      cnpj,
      razaoSocial,
      JSON.stringify(contatos.telefones),
      contatos.whatsapp,
      JSON.stringify(contatos.emails),
      contatos.endereco,
      JSON.stringify(contatos.redes_sociais)
    ];

    try {
      const resultado = await this.executor.query(sqlUpsert(this.tabela), valores);
      const [linha] = resultado.rows;
      if (!linha) {
        throw new Error('Upsert não retornou nenhuma linha');
      }
      return linhaParaRegistro(linha);
    } catch (error) {
      throw new PersistenciaError(
        `Erro ao salvar contatos no banco de dados: ${descreverErro(error)}`,
        this.nome,
        error
      );
    }
  }

  async buscar(cnpj: string): Promise<RegistroContatos | null> {
    try {
      const resultado = await this.executor.query(
        `SELECT ${COLUNAS} FROM ${this.tabela} WHERE cnpj = $1`,
        [cnpj]
      );
      const [linha] = resultado.rows;
      return linha ? linhaParaRegistro(linha) : null;
    } catch (error) {
      throw new PersistenciaError(
        `Erro ao consultar contatos do CNPJ ${cnpj}: ${descreverErro(error)}`,
        this.nome,
        error
      );
    }
  }

  async encerrar(): Promise<void> {
    await this.executor.end?.();
  }
}
