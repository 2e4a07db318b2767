import { REDES_SOCIAIS_SUPORTADAS, redesSociaisVazias } from '../types/index.js';
import type { ContatosExtraidos, RedesSociais, RegistroContatos } from '../types/index.js';

/**
 * Destino durável dos contatos, com um registro por CNPJ.
 *
 * `salvar` substitui o registro inteiro (último a gravar vence) em uma única
 * operação atômica e renova a data de atualização. Falhas são lançadas como
 * `PersistenciaError`.
 */
export interface RepositorioContatos {
  readonly nome: string;
  inicializar(): Promise<void>;
  salvar(cnpj: string, razaoSocial: string, contatos: ContatosExtraidos): Promise<RegistroContatos>;
  buscar(cnpj: string): Promise<RegistroContatos | null>;
  encerrar(): Promise<void>;
}

export function listaDeStrings(valor: unknown): string[] {
  return Array.isArray(valor)
    ? valor.filter((item): item is string => typeof item === 'string' && item.length > 0)
    : [];
}

export function textoOuNulo(valor: unknown): string | null {
  return typeof valor === 'string' && valor.length > 0 ? valor : null;
}

export function lerRedesSociais(valor: unknown): RedesSociais {
  const redes = redesSociaisVazias();
  if (typeof valor !== 'object' || valor === null) {
    return redes;
  }

  for (const rede of REDES_SOCIAIS_SUPORTADAS) {
    redes[rede] = textoOuNulo(Reflect.get(valor, rede));
  }
  return redes;
}

/**
 * Reconstrói os contatos a partir de campos lidos de um armazenamento
 */
export function lerContatos(campos: Record<string, unknown>): ContatosExtraidos {
  return {
    telefones: listaDeStrings(campos.telefones),
    whatsapp: textoOuNulo(campos.whatsapp),
    emails: listaDeStrings(campos.emails),
    endereco: textoOuNulo(campos.endereco),
    redes_sociais: lerRedesSociais(campos.redes_sociais)
  };
}
