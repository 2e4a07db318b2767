import type { DocumentoHtml } from '../documento.js';
import type { LoggerEmpresa } from '../../utils/logging/index.js';
import type { ParcialContatos } from '../../types/index.js';

/**
 * Estratégia de extração de uma categoria de contato.
 *
 * Lê o documento sem alterá-lo e devolve apenas a sua fatia do registro;
 * nenhum extrator depende da saída de outro.
 */
export interface ExtratorContatos {
  readonly nome: string;
  extrair(doc: DocumentoHtml, log: LoggerEmpresa): ParcialContatos;
}

/**
 * Acrescenta o valor se não for vazio nem repetido. Retorna se acrescentou.
 */
export function adicionarSemDuplicar(lista: string[], valor: string): boolean {
  if (!valor || lista.includes(valor)) {
    return false;
  }
  lista.push(valor);
  return true;
}
