import { hrefsDasAncoras } from '../documento.js';
import { REDES_SOCIAIS_SUPORTADAS } from '../../types/index.js';
import type { RedeSocial } from '../../types/index.js';
import type { ExtratorContatos } from './extrator.js';

export const PADROES_REDES_SOCIAIS: Record<RedeSocial, RegExp> = {
  facebook: /facebook\.com/i,
  instagram: /instagram\.com/i,
  linkedin: /linkedin\.com/i,
  youtube: /youtube\.com|youtu\.be/i
};

/**
 * Primeiro link de cada rede social, na ordem do documento.
 * Links posteriores da mesma rede são ignorados.
 */
export const extratorRedesSociais: ExtratorContatos = {
  nome: 'redes_sociais',

  extrair(doc, log) {
    const redes: Partial<Record<RedeSocial, string>> = {};

    for (const href of hrefsDasAncoras(doc)) {
      for (const rede of REDES_SOCIAIS_SUPORTADAS) {
        if (redes[rede] === undefined && PADROES_REDES_SOCIAIS[rede].test(href)) {
          redes[rede] = href;
          log.debug(`Rede social detectada: ${rede} -> ${href}`);
        }
      }
    }

    return { redes_sociais: redes };
  }
};
