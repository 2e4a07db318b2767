/**
 * Documento HTML navegável compartilhado pelos extratores.
 *
 * As coleções do cheerio seguem a ordem do documento, e os extratores
 * dependem disso para a regra "primeiro encontrado vence".
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { hasChildren, isTag, isText } from 'domhandler';
import type { AnyNode } from 'domhandler';

export type DocumentoHtml = CheerioAPI;

/** Elementos cujo conteúdo não é texto visível */
const TAGS_INVISIVEIS: ReadonlySet<string> = new Set(['script', 'style', 'noscript', 'template']);

export function carregarDocumento(html: string): DocumentoHtml {
  return cheerio.load(html);
}

function coletarTextos(node: AnyNode, saida: string[]): void {
  if (isText(node)) {
    const texto = node.data.trim();
    if (texto) {
      saida.push(texto);
    }
    return;
  }

  if (isTag(node) && TAGS_INVISIVEIS.has(node.name)) {
    return;
  }

  if (hasChildren(node)) {
    for (const filho of node.children) {
      coletarTextos(filho, saida);
    }
  }
}

/**
 * Texto do nó com cada trecho aparado e os trechos unidos por um espaço
 */
export function textoDoElemento(node: AnyNode): string {
  const trechos: string[] = [];
  coletarTextos(node, trechos);
  return trechos.join(' ');
}

/**
 * Todo o texto visível do documento
 */
export function textoVisivel(doc: DocumentoHtml): string {
  return doc.root().toArray().map(textoDoElemento).join(' ');
}

/**
 * Texto único de um elemento: existe quando o elemento tem um só filho e
 * esse filho é texto, ou é um elemento que por sua vez tem texto único.
 */
export function stringUnica(node: AnyNode): string | null {
  if (!hasChildren(node) || node.children.length !== 1) {
    return null;
  }

  const filho = node.children[0];
  if (isText(filho)) {
    return filho.data;
  }
  return isTag(filho) ? stringUnica(filho) : null;
}

/**
 * Valores de `href` de todas as âncoras, na ordem do documento
 */
export function hrefsDasAncoras(doc: DocumentoHtml): string[] {
  const hrefs: string[] = [];
  doc('a[href]').each((_, el) => {
    const href = doc(el).attr('href');
    if (href !== undefined) {
      hrefs.push(href.trim());
    }
  });
  return hrefs;
}

/**
 * Texto de cada elemento que casa com o seletor, na ordem do documento
 */
export function textosDosElementos(doc: DocumentoHtml, seletor: string): string[] {
  return doc(seletor).toArray().map(textoDoElemento);
}
