/**
 * Tipos do domínio de contatos de empresas
 */

export const REDES_SOCIAIS_SUPORTADAS = ['facebook', 'instagram', 'linkedin', 'youtube'] as const;

export type RedeSocial = typeof REDES_SOCIAIS_SUPORTADAS[number];

export type RedesSociais = Record<RedeSocial, string | null>;

/**
 * Contatos extraídos de uma página, no formato JSON exportado e persistido
 */
export interface ContatosExtraidos {
  telefones: string[];
  whatsapp: string | null;
  emails: string[];
  endereco: string | null;
  redes_sociais: RedesSociais;
}

/**
 * Fatia de contatos produzida por um extrator
 */
export interface ParcialContatos {
  telefones?: string[];
  whatsapp?: string | null;
  emails?: string[];
  endereco?: string | null;
  redes_sociais?: Partial<RedesSociais>;
}

/**
 * Registro persistido: um por CNPJ
 */
export interface RegistroContatos {
  cnpj: string;
  razaoSocial: string;
  contatos: ContatosExtraidos;
  ultimaAtualizacao: Date;
}

/**
 * Empresa a ser enriquecida
 */
export interface EmpresaAlvo {
  cnpj: string;
  razaoSocial: string;
  url: string;
  redesSociais?: Partial<RedesSociais>;
}

export function redesSociaisVazias(): RedesSociais {
  return {
    facebook: null,
    instagram: null,
    linkedin: null,
    youtube: null
  };
}

export function contatosVazios(): ContatosExtraidos {
  return {
    telefones: [],
    whatsapp: null,
    emails: [],
    endereco: null,
    redes_sociais: redesSociaisVazias()
  };
}
