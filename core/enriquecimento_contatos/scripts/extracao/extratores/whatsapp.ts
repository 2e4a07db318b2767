import { textoVisivel } from '../documento.js';
import { normalizarNumeroWhatsApp } from '../../utils/formatters.js';
import type { ExtratorContatos } from './extrator.js';

export const WHATSAPP_PATTERN =
  /whats\s?app\s*:\s*(\+?\d{0,3}[\s-]?\(?\d{2}\)?[\s-]?\d{4,5}[\s-]?\d{4})/i;

export const URL_BASE_WHATSAPP = 'https://api.whatsapp.com/send?phone=';

export function montarLinkWhatsApp(numero: string): string {
  return `${URL_BASE_WHATSAPP}${numero}`;
}

/**
 * Número de WhatsApp rotulado no texto visível ("WhatsApp: (11) 99999-9999").
 * Só a primeira ocorrência conta; o número também entra na lista de telefones.
 */
export const extratorWhatsApp: ExtratorContatos = {
  nome: 'whatsapp',

  extrair(doc, log) {
    const match = WHATSAPP_PATTERN.exec(textoVisivel(doc));
    if (!match) {
      return {};
    }

    const numero = normalizarNumeroWhatsApp(match[1]);
    if (!numero) {
      return {};
    }

    log.debug(`WhatsApp detectado: ${numero}`);
    return {
      whatsapp: montarLinkWhatsApp(numero),
      telefones: [numero]
    };
  }
};
