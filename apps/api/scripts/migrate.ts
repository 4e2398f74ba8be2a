#!/usr/bin/env tsx
// =====================================================
// Schema Migration Script
// =====================================================
// Run with: npm run db:migrate --workspace @rankline/api
//
// Applies every migrations/*.sql file in name order. Statements use
// CREATE ... IF NOT EXISTS, so running it twice is harmless.

import 'dotenv/config';
import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { config } from '../src/config';
import { createMySqlPool } from '../src/lib/mysql';
import { logger } from '../src/utils/logger';

const MIGRATIONS_DIR = join(__dirname, '..', 'migrations');

/**
 * Splits a migration file into statements, dropping `--` comment lines.
 */
export function splitSqlStatements(sql: string): string[] {
  return sql
    .split('\n')
    .filter((line) => !line.trim().startsWith('--'))
    .join('\n')
    .split(';')
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

async function migrate(): Promise<void> {
  const files = (await readdir(MIGRATIONS_DIR)).filter((file) => file.endsWith('.sql')).sort();
  const pool = createMySqlPool({
    url: config.durable.url,
    connectionLimit: 1,
  });

  try {
    for (const file of files) {
      const statements = splitSqlStatements(await readFile(join(MIGRATIONS_DIR, file), 'utf8'));
      for (const statement of statements) {
        await pool.query(statement);
      }
      logger.info(`[MySQL] Applied ${file} (${statements.length} statements)`);
    }
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  migrate()
    .then(() => {
      logger.info('[MySQL] Migrations complete');
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.error('[MySQL] Migration failed:', error);
      process.exit(1);
    });
}
