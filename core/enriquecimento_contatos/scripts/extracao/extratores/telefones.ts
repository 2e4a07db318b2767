import { hrefsDasAncoras, textosDosElementos } from '../documento.js';
import { normalizarTelefone } from '../../utils/formatters.js';
import { adicionarSemDuplicar } from './extrator.js';
import type { ExtratorContatos } from './extrator.js';

/**
 * Telefone rotulado ("Tel: ...", "Telefone: ...") ou no formato
 * (DD) NNNN-NNNN / (DD) NNNNN-NNNN
 */
export const PHONE_PATTERN =
  /(?:tel|phone|telefone|fone)[\s:]*([+\d\s\-()]{8,})|(\(?\d{2,3}\)?[\s-]?\d{4,5}[\s-]?\d{4})/gi;

const ELEMENTOS_TEXTO = 'p, div, span, li';
const PREFIXO_TEL = /^tel:/i;

/**
 * Candidatos a telefone encontrados em um texto, na ordem em que aparecem
 */
export function telefonesNoTexto(texto: string): string[] {
  const encontrados: string[] = [];
  for (const match of texto.matchAll(PHONE_PATTERN)) {
    const bruto = match[1] ?? match[2];
    if (bruto) {
      encontrados.push(bruto);
    }
  }
  return encontrados;
}

export const extratorTelefones: ExtratorContatos = {
  nome: 'telefones',

  extrair(doc, log) {
    const telefones: string[] = [];

    for (const texto of textosDosElementos(doc, ELEMENTOS_TEXTO)) {
      for (const bruto of telefonesNoTexto(texto)) {
        const telefone = normalizarTelefone(bruto);
        if (adicionarSemDuplicar(telefones, telefone)) {
          log.debug(`Telefone encontrado: ${telefone}`);
        }
      }
    }

    for (const href of hrefsDasAncoras(doc)) {
      if (!PREFIXO_TEL.test(href)) {
        continue;
      }
      const telefone = normalizarTelefone(href.replace(PREFIXO_TEL, ''));
      if (adicionarSemDuplicar(telefones, telefone)) {
        log.debug(`Telefone em link detectado: ${telefone}`);
      }
    }

    return { telefones };
  }
};
