/**
 * Conexão com o PostgreSQL onde ficam os dados enriquecidos
 */
import pg from 'pg';
import { logger } from '../../logging/index.js';
import { etlConfig } from '../../../../../../config/index.js';
import type { ETLConfig } from '../../../../../../config/index.js';

/**
 * O que os repositórios precisam de uma conexão: executar um comando
 * parametrizado e, opcionalmente, encerrar.
 */
export interface ExecutorSql {
  query(texto: string, valores?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
  end?(): Promise<void>;
}

export function criarPoolPostgres(config: ETLConfig['postgres'] = etlConfig.postgres): pg.Pool {
  const pool = new pg.Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    connectionTimeoutMillis: config.connectTimeout,
    max: config.maxConnections
  });

  // Erros de conexões ociosas chegam por evento; sem ouvinte derrubariam o processo
  pool.on('error', (error) => {
    logger.error(`Erro em conexão ociosa com o banco de dados: ${error.message}`);
  });

  logger.info(`🐘 Pool PostgreSQL configurado para ${config.host}:${config.port}/${config.database}`);
  return pool;
}

export function executorDoPool(pool: pg.Pool): ExecutorSql {
  return {
    query: (texto, valores) => pool.query(texto, valores),
    end: () => pool.end()
  };
}
