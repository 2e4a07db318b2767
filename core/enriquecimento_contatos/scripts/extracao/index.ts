/**
 * Extração de contatos de páginas HTML
 *
 * @example
 * ```typescript
 * import { carregarDocumento, EXTRATORES_PADRAO } from '../extracao/index.js';
 *
 * const doc = carregarDocumento(html);
 * const parciais = EXTRATORES_PADRAO.map(e => e.extrair(doc, log));
 * ```
 */

import { extratorWhatsApp } from './extratores/whatsapp.js';
import { extratorTelefones } from './extratores/telefones.js';
import { extratorEmails } from './extratores/emails.js';
import { extratorRedesSociais } from './extratores/redes-sociais.js';
import { extratorEndereco } from './extratores/endereco.js';
import type { ExtratorContatos } from './extratores/extrator.js';

export {
  carregarDocumento,
  textoDoElemento,
  textoVisivel,
  stringUnica,
  hrefsDasAncoras,
  textosDosElementos
} from './documento.js';
export type { DocumentoHtml } from './documento.js';

export { adicionarSemDuplicar } from './extratores/extrator.js';
export type { ExtratorContatos } from './extratores/extrator.js';
export { extratorWhatsApp, montarLinkWhatsApp, URL_BASE_WHATSAPP, WHATSAPP_PATTERN } from './extratores/whatsapp.js';
export { extratorTelefones, telefonesNoTexto, PHONE_PATTERN } from './extratores/telefones.js';
export { extratorEmails, EMAIL_PATTERN } from './extratores/emails.js';
export { extratorRedesSociais, PADROES_REDES_SOCIAIS } from './extratores/redes-sociais.js';
export { extratorEndereco, validarEndereco, ADDRESS_KEYWORDS } from './extratores/endereco.js';

/**
 * Extratores aplicados a cada página, nesta ordem
 */
export const EXTRATORES_PADRAO: readonly ExtratorContatos[] = [
  extratorWhatsApp,
  extratorTelefones,
  extratorEmails,
  extratorRedesSociais,
  extratorEndereco
];
