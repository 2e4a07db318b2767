import { hrefsDasAncoras, textosDosElementos } from '../documento.js';
import { normalizarEmail } from '../../utils/formatters.js';
import { adicionarSemDuplicar } from './extrator.js';
import type { ExtratorContatos } from './extrator.js';

export const EMAIL_PATTERN = /[\w.+-]+@[\w-]+(?:\.[\w-]+)*\.[a-z]{2,}/gi;

const ELEMENTOS_TEXTO = 'a, p, div, span';
const PREFIXO_MAILTO = /^mailto:/i;
// Nomes de arquivo como logo@2x.png também casam com o padrão
const EXTENSAO_ARQUIVO = /\.(png|jpe?g|gif|svg|webp)$/i;

export const extratorEmails: ExtratorContatos = {
  nome: 'emails',

  extrair(doc, log) {
    const emails: string[] = [];

    for (const texto of textosDosElementos(doc, ELEMENTOS_TEXTO)) {
      for (const match of texto.matchAll(EMAIL_PATTERN)) {
        const email = normalizarEmail(match[0]);
        if (EXTENSAO_ARQUIVO.test(email)) {
          continue;
        }
        if (adicionarSemDuplicar(emails, email)) {
          log.debug(`E-mail encontrado: ${email}`);
        }
      }
    }

    for (const href of hrefsDasAncoras(doc)) {
      if (!PREFIXO_MAILTO.test(href)) {
        continue;
      }
      const email = normalizarEmail(href);
      if (adicionarSemDuplicar(emails, email)) {
        log.debug(`E-mail em link detectado: ${email}`);
      }
    }

    return { emails };
  }
};
