/**
 * Repositório de contatos no Firestore, um documento por CNPJ
 */
import { FieldValue, Timestamp } from 'firebase-admin/firestore';
import { PersistenciaError, descreverErro, logger } from '../utils/logging/index.js';
import type { ContatosExtraidos, RegistroContatos } from '../types/index.js';
import { lerContatos, textoOuNulo } from './repositorio.js';
import type { RepositorioContatos } from './repositorio.js';

export interface DocumentoContatosFirestore extends ContatosExtraidos {
  cnpj: string;
  razao_social: string;
  ultima_atualizacao: FieldValue;
}

/**
 * Parte do Firestore usada pelo repositório
 */
export interface BancoFirestore {
  collection(caminho: string): {
    doc(id: string): {
      set(dados: DocumentoContatosFirestore): Promise<{ writeTime: Timestamp }>;
      get(): Promise<{ exists: boolean; data(): Record<string, unknown> | undefined }>;
    };
  };
}

export class RepositorioContatosFirestore implements RepositorioContatos {
  readonly nome: string;
  private banco: BancoFirestore | null = null;

  constructor(
    private readonly obterBanco: () => Promise<BancoFirestore>,
    private readonly colecao: string,
    private readonly encerrarBanco: () => Promise<void> = async () => undefined,
    nome: string = 'firestore'
  ) {
    this.nome = nome;
  }

  private async conexao(): Promise<BancoFirestore> {
    if (!this.banco) {
      this.banco = await this.obterBanco();
    }
    return this.banco;
  }

  async inicializar(): Promise<void> {
    try {
      await this.conexao();
    } catch (error) {
      throw new PersistenciaError(
        `Erro ao conectar ao Firestore: ${descreverErro(error)}`,
        this.nome,
        error
      );
    }
  }

  async salvar(cnpj: string, razaoSocial: string, contatos: ContatosExtraidos): Promise<RegistroContatos> {
    try {
      const banco = await this.conexao();
      // set sem merge: o documento anterior é substituído por inteiro
      const resultado = await banco.collection(this.colecao).doc(cnpj).set({
        cnpj,
        razao_social: razaoSocial,
        ...contatos,
        ultima_atualizacao: FieldValue.serverTimestamp()
      });
      logger.debug(`Documento salvo: ${this.colecao}/${cnpj}`);

      return {
        cnpj,
        razaoSocial,
        contatos,
        ultimaAtualizacao: resultado.writeTime.toDate()
      };
    } catch (error) {
      throw new PersistenciaError(
        `Erro ao salvar contatos no Firestore: ${descreverErro(error)}`,
        this.nome,
        error
      );
    }
  }

  async buscar(cnpj: string): Promise<RegistroContatos | null> {
    let dados: Record<string, unknown> | undefined;
    try {
      const banco = await this.conexao();
      const snapshot = await banco.collection(this.colecao).doc(cnpj).get();
      dados = snapshot.exists ? snapshot.data() : undefined;
    } catch (error) {
      throw new PersistenciaError(
        `Erro ao consultar contatos do CNPJ ${cnpj} no Firestore: ${descreverErro(error)}`,
        this.nome,
        error
      );
    }

    if (!dados) {
      return null;
    }

    const atualizacao = dados.ultima_atualizacao;
    return {
      cnpj,
      razaoSocial: textoOuNulo(dados.razao_social) ?? '',
      contatos: lerContatos(dados),
      ultimaAtualizacao: atualizacao instanceof Timestamp ? atualizacao.toDate() : new Date(0)
    };
  }

  async encerrar(): Promise<void> {
    if (this.banco) {
      this.banco = null;
      await this.encerrarBanco();
    }
  }
}
