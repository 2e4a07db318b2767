/**
 * Montagem do registro de contatos a partir das fatias dos extratores
 */

import { carregarDocumento, EXTRATORES_PADRAO, adicionarSemDuplicar } from '../extracao/index.js';
import type { DocumentoHtml, ExtratorContatos } from '../extracao/index.js';
import { logger } from '../utils/logging/index.js';
import { normalizarNumeroWhatsApp } from '../utils/formatters.js';
import type { LoggerEmpresa } from '../utils/logging/index.js';
import { REDES_SOCIAIS_SUPORTADAS, contatosVazios } from '../types/index.js';
import type { ContatosExtraidos, ParcialContatos, RedesSociais } from '../types/index.js';

/**
 * Junta as fatias em um único registro. Listas são concatenadas na ordem
 * dos extratores sem repetição; campos únicos e redes sociais ficam com o
 * primeiro valor preenchido, começando pelas redes já conhecidas.
 *
 * Telefones são comparados pelo número com código do país, então
 * `11999999999` e `5511999999999` contam como o mesmo.
 */
export function montarContatos(
  parciais: readonly ParcialContatos[],
  redesSociaisIniciais?: Partial<RedesSociais>
): ContatosExtraidos {
  const contatos = contatosVazios();
  const numerosVistos = new Set<string>();

  for (const rede of REDES_SOCIAIS_SUPORTADAS) {
    contatos.redes_sociais[rede] = redesSociaisIniciais?.[rede] || null;
  }

  for (const parcial of parciais) {
    parcial.telefones?.forEach(telefone => {
      const numero = normalizarNumeroWhatsApp(telefone);
      if (numero && !numerosVistos.has(numero)) {
        numerosVistos.add(numero);
        contatos.telefones.push(telefone);
      }
    });
    parcial.emails?.forEach(email => adicionarSemDuplicar(contatos.emails, email));

    if (contatos.whatsapp === null && parcial.whatsapp) {
      contatos.whatsapp = parcial.whatsapp;
    }

    if (contatos.endereco === null && parcial.endereco) {
      contatos.endereco = parcial.endereco;
    }

    for (const rede of REDES_SOCIAIS_SUPORTADAS) {
      const link = parcial.redes_sociais?.[rede];
      if (contatos.redes_sociais[rede] === null && link) {
        contatos.redes_sociais[rede] = link;
      }
    }
  }

  return contatos;
}

export interface OpcoesExtracao {
  url: string;
  nomeEmpresa?: string;
  redesSociais?: Partial<RedesSociais>;
  extratores?: readonly ExtratorContatos[];
  log?: LoggerEmpresa;
}

/**
 * Extrai todos os contatos estratégicos de uma página
 *
 * @example
 * ```typescript
 * const contatos = extrairContatosEstrategicos(html, { url: 'https://exemplo.com.br' });
 * ```
 */
export function extrairContatosEstrategicos(
  pagina: string | DocumentoHtml,
  opcoes: OpcoesExtracao
): ContatosExtraidos {
  const log = opcoes.log ?? logger.paraEmpresa(opcoes.nomeEmpresa);
  const doc = typeof pagina === 'string' ? carregarDocumento(pagina) : pagina;
  const extratores = opcoes.extratores ?? EXTRATORES_PADRAO;

  log.info(`Iniciando extração de contatos de: ${opcoes.url}`);

  const parciais = extratores.map(extrator => extrator.extrair(doc, log));
  const contatos = montarContatos(parciais, opcoes.redesSociais);

  const redes = REDES_SOCIAIS_SUPORTADAS.filter(rede => contatos.redes_sociais[rede] !== null);
  log.info(
    `Extração concluída: ${contatos.telefones.length} telefone(s), ${contatos.emails.length} e-mail(s), ` +
    `WhatsApp ${contatos.whatsapp ? 'sim' : 'não'}, endereço ${contatos.endereco ? 'sim' : 'não'}, ` +
    `redes: ${redes.length > 0 ? redes.join(', ') : 'nenhuma'}`
  );

  return contatos;
}
