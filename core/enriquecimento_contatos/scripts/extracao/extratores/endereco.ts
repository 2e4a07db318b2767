import { stringUnica, textoDoElemento } from '../documento.js';
import type { DocumentoHtml } from '../documento.js';
import type { ExtratorContatos } from './extrator.js';
import type { Element } from 'domhandler';

export const ADDRESS_KEYWORDS = /rua|avenida|av\.|bairro|cep|\d{5}-\d{3}/i;
const CLASSE_ENDERECO = /address|endereco|local/i;
const CLASSE_ELEMENTOR = /elementor-icon-list-text/i;

const TERMOS_ENDERECO = ['rua', 'av', 'avenida', 'bairro', 'cep'];
const MINIMO_PALAVRAS = 5;

/**
 * Um texto passa por endereço quando tem algum dígito, algum termo de
 * endereço e pelo menos cinco palavras.
 */
export function validarEndereco(texto: string): boolean {
  const minusculo = texto.toLowerCase();
  return /\d/.test(texto) &&
    TERMOS_ENDERECO.some(termo => minusculo.includes(termo)) &&
    texto.split(/\s+/).filter(Boolean).length >= MINIMO_PALAVRAS;
}

function elementosComClasse(doc: DocumentoHtml, seletor: string, padrao: RegExp) {
  return doc<Element, string>(seletor).toArray().filter(el => padrao.test(el.attribs.class ?? ''));
}

/**
 * Passo 1: elementos cujo texto único tem palavra-chave de endereço; se não
 * houver nenhum, elementos com classe de endereço.
 */
function candidatosPorPalavraChave(doc: DocumentoHtml): string[] {
  const porTexto = doc('p, div, li, ul').toArray().filter(el => {
    const texto = stringUnica(el);
    return texto !== null && ADDRESS_KEYWORDS.test(texto);
  });

  const elementos = porTexto.length > 0
    ? porTexto
    : elementosComClasse(doc, 'p, div, li', CLASSE_ENDERECO);

  return elementos.map(textoDoElemento);
}

/**
 * Passo 2: textos das listas de ícones do Elementor
 */
function candidatosElementor(doc: DocumentoHtml): string[] {
  return elementosComClasse(doc, 'span', CLASSE_ELEMENTOR).map(textoDoElemento);
}

export const extratorEndereco: ExtratorContatos = {
  nome: 'endereco',

  extrair(doc, log) {
    const candidatos = [...candidatosPorPalavraChave(doc), ...candidatosElementor(doc)];
    const endereco = candidatos.find(validarEndereco) ?? null;

    if (endereco) {
      log.debug(`Endereço encontrado: ${endereco.slice(0, 50)}...`);
    }

    return { endereco };
  }
};
