// =====================================================
// MySQL Pool
// =====================================================
// Connection pool for the durable store.

import mysql, { Pool } from 'mysql2/promise';
import { logger } from '../utils/logger';

export interface MySqlConnectionConfig {
  url: string;
  connectionLimit: number;
}

export function createMySqlPool(config: MySqlConnectionConfig): Pool {
  const pool = mysql.createPool({
    uri: config.url,
    connectionLimit: config.connectionLimit,
    waitForConnections: true,
    // BIGINT totals come back as numbers while they stay in the safe range
    supportBigNumbers: true,
    bigNumberStrings: false,
    timezone: 'Z',
  });

  logger.info(`[MySQL] Pool created: ${config.url.replace(/:[^:@]+@/, ':***@')}`);

  return pool;
}
