/**
 * Persistência dos contatos extraídos
 */
import * as path from 'path';
import { etlConfig } from '../../../../config/index.js';
import type { ETLConfig } from '../../../../config/index.js';
import type { Destino } from '../types/index.js';
import { criarPoolPostgres, executorDoPool } from '../utils/storage/postgres/config.js';
import { encerrarFirestore, initializeFirestore } from '../utils/storage/firestore/config.js';
import { RepositorioContatosPostgres } from './postgres.js';
import { RepositorioContatosFirestore } from './firestore.js';
import { RepositorioContatosArquivo } from './arquivo.js';
import type { RepositorioContatos } from './repositorio.js';

export type { RepositorioContatos } from './repositorio.js';
export { lerContatos, lerRedesSociais, listaDeStrings, textoOuNulo } from './repositorio.js';
export { RepositorioContatosPostgres, sqlCriarTabela, sqlCriarIndice, sqlUpsert } from './postgres.js';
export { RepositorioContatosFirestore } from './firestore.js';
export type { BancoFirestore, DocumentoContatosFirestore } from './firestore.js';
export { RepositorioContatosArquivo, salvarContatosEmArquivo } from './arquivo.js';

/**
 * Cria um repositório por destino pedido, sem repetir destinos.
 * Firestore real e emulador compartilham a mesma conexão; o emulador prevalece.
 */
export function criarRepositorios(
  destinos: readonly Destino[],
  config: ETLConfig = etlConfig
): RepositorioContatos[] {
  const unicos = [...new Set(destinos)];
  const repositorios: RepositorioContatos[] = [];

  if (unicos.includes('postgres')) {
    repositorios.push(new RepositorioContatosPostgres(
      executorDoPool(criarPoolPostgres(config.postgres)),
      config.postgres.table
    ));
  }

  if (unicos.includes('emulator') || unicos.includes('firestore')) {
    const modo = unicos.includes('emulator') ? 'emulador' : 'producao';
    repositorios.push(new RepositorioContatosFirestore(
      () => initializeFirestore(modo, config.firestore),
      config.firestore.collection,
      encerrarFirestore,
      modo === 'emulador' ? 'emulator' : 'firestore'
    ));
  }

  if (unicos.includes('pc')) {
    repositorios.push(new RepositorioContatosArquivo(
      path.join(config.export.baseDir, config.export.arquivoContatos)
    ));
  }

  return repositorios;
}
