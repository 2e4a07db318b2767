/**
 * Configuração do Firebase Admin SDK para acesso ao Firestore
 * Deve ser chamado APÓS a configuração das variáveis de ambiente
 */
import admin from 'firebase-admin';
import * as path from 'path';
import * as fs from 'fs';
import { logger } from '../../logging/index.js';
import { etlConfig } from '../../../../../../config/index.js';
import type { ETLConfig } from '../../../../../../config/index.js';

export type ModoFirestore = 'producao' | 'emulador';

let db: admin.firestore.Firestore | null = null;
let modoAtual: ModoFirestore | null = null;

/**
 * Inicializa o Firebase Admin SDK e devolve o Firestore configurado.
 * Chamadas seguintes reaproveitam a mesma instância.
 */
export async function initializeFirestore(
  modo: ModoFirestore,
  config: ETLConfig['firestore'] = etlConfig.firestore
): Promise<admin.firestore.Firestore> {
  if (db && modoAtual) {
    if (modoAtual !== modo) {
      logger.warn(`Firestore já inicializado em modo ${modoAtual}; ignorando pedido de modo ${modo}`);
    }
    return db;
  }

  let app: admin.app.App;
  try {
    if (modo === 'emulador') {
      app = admin.initializeApp({ projectId: config.projectId });
    } else {
      if (!config.credentialsPath) {
        throw new Error('GOOGLE_APPLICATION_CREDENTIALS não definido para o Firestore de produção');
      }
      const credenciais = path.resolve(process.cwd(), config.credentialsPath);
      if (!fs.existsSync(credenciais)) {
        throw new Error(`Arquivo de credenciais não encontrado: ${credenciais}`);
      }
      app = admin.initializeApp({
        credential: admin.credential.cert(credenciais),
        projectId: config.projectId
      });
    }
    logger.info('Firebase Admin SDK inicializado com sucesso');
  } catch (error) {
    logger.error('Erro ao inicializar Firebase Admin SDK:', error);
    throw error;
  }

  const firestore = app.firestore();
  if (modo === 'emulador') {
    firestore.settings({
      host: config.emulatorHost,
      ssl: false,
      ignoreUndefinedProperties: true
    });
    logger.info(`🔌 Conexão com Firestore EMULADOR estabelecida em: ${config.emulatorHost}`);
  } else {
    firestore.settings({ ignoreUndefinedProperties: true });
    logger.info('☁️  Conexão com Firestore REAL (Produção) estabelecida');
  }

  db = firestore;
  modoAtual = modo;
  return firestore;
}

/**
 * Encerra a conexão aberta por `initializeFirestore`, se houver
 */
export async function encerrarFirestore(): Promise<void> {
  if (!db) {
    return;
  }
  await db.terminate();
  await Promise.all(admin.apps.map(app => app?.delete()));
  db = null;
  modoAtual = null;
}
