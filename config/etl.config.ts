/**
 * 🎯 CONFIGURAÇÃO CANÔNICA DO ETL DE ENRIQUECIMENTO DE CONTATOS
 *
 * Única fonte de verdade para configurações do sistema.
 * Pode ser sobrescrita por variáveis de ambiente para diferentes ambientes.
 */

export type NivelLog = 'error' | 'warn' | 'info' | 'debug';

export interface ETLConfig {
  scraper: {
    concurrency: number;
    timeout: number;
    pauseBetweenBatches: number;
    userAgent: string;
    verifySsl: boolean;
    maxRetries: number;
    retryDelay: number;
  };
  postgres: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    connectTimeout: number;
    maxConnections: number;
    table: string;
  };
  firestore: {
    collection: string;
    emulatorHost: string;
    projectId?: string;
    credentialsPath?: string;
  };
  export: {
    baseDir: string;
    arquivoContatos: string;
  };
  logging: {
    level: NivelLog;
    showTimestamp: boolean;
  };
}

const NIVEIS_LOG: readonly NivelLog[] = ['error', 'warn', 'info', 'debug'];

function lerNivelLog(valor: string | undefined): NivelLog {
  const nivel = (valor || 'info').toLowerCase();
  return NIVEIS_LOG.find(n => n === nivel) ?? 'info';
}

export const etlConfig: ETLConfig = {
  scraper: {
    concurrency: parseInt(process.env.SCRAPER_CONCURRENCY || '3', 10),
    timeout: parseInt(process.env.SCRAPER_TIMEOUT || '15000', 10),
    // Pausa entre lotes para não sobrecarregar os sites consultados
    pauseBetweenBatches: parseInt(process.env.SCRAPER_PAUSE_BETWEEN_BATCHES || '500', 10),
    userAgent: process.env.SCRAPER_USER_AGENT ||
      'Mozilla/5.0 (compatible; EnriquecimentoContatos/1.0)',
    verifySsl: process.env.SCRAPER_VERIFY_SSL === 'true',
    maxRetries: parseInt(process.env.SCRAPER_MAX_RETRIES || '1', 10),
    retryDelay: parseInt(process.env.SCRAPER_RETRY_DELAY || '1000', 10)
  },
  postgres: {
    host: process.env.POSTGRES_HOST || 'localhost',
    port: parseInt(process.env.POSTGRES_PORT || '5432', 10),
    database: process.env.POSTGRES_DB || 'cnpj_receita',
    user: process.env.POSTGRES_USER || 'postgres',
    password: process.env.POSTGRES_PASSWORD || '',
    connectTimeout: parseInt(process.env.POSTGRES_CONNECT_TIMEOUT || '5000', 10),
    maxConnections: parseInt(process.env.POSTGRES_MAX_CONNECTIONS || '5', 10),
    table: process.env.POSTGRES_TABLE || 'dados_enriquecidos'
  },
  firestore: {
    collection: process.env.FIRESTORE_COLLECTION || 'contatos_empresas',
    emulatorHost: process.env.FIRESTORE_EMULATOR_HOST || '127.0.0.1:8080',
    projectId: process.env.FIRESTORE_PROJECT_ID,
    credentialsPath: process.env.GOOGLE_APPLICATION_CREDENTIALS
  },
  export: {
    baseDir: process.env.EXPORT_BASE_DIR || 'dados_extraidos',
    arquivoContatos: process.env.EXPORT_ARQUIVO_CONTATOS || 'contatos_empresas.json'
  },
  logging: {
    level: lerNivelLog(process.env.LOG_LEVEL),
    showTimestamp: process.env.LOG_TIMESTAMP !== 'false'
  }
};

const IDENTIFICADOR_SQL = /^[a-z_][a-z0-9_]*$/i;

/**
 * Valida a configuração em runtime. Chamado pelo executor antes de processar.
 */
export function validateETLConfig(config: ETLConfig): void {
  if (!Number.isInteger(config.scraper.concurrency) || config.scraper.concurrency <= 0) {
    throw new Error('Configuração inválida: scraper.concurrency deve ser maior que 0');
  }

  if (!Number.isInteger(config.scraper.timeout) || config.scraper.timeout <= 0) {
    throw new Error('Configuração inválida: scraper.timeout deve ser maior que 0');
  }

  if (!Number.isInteger(config.scraper.maxRetries) || config.scraper.maxRetries < 1) {
    throw new Error('Configuração inválida: scraper.maxRetries deve ser pelo menos 1');
  }

  if (!IDENTIFICADOR_SQL.test(config.postgres.table)) {
    throw new Error(`Configuração inválida: nome de tabela "${config.postgres.table}" não é um identificador SQL simples`);
  }
}
