/**
 * Apply database migrations to Supabase
 * Usage: npm run migrate
 *
 * Each file in supabase/migrations is sent whole to the exec_sql(sql text)
 * function, in file-name order. The function bodies in the schema contain
 * semicolons, so files are never split into statements.
 */

import 'dotenv/config';
import { readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

import { loadConfig } from '../src/lib/config.js';
import { logger } from '../src/lib/logger.js';
import { createSupabaseAdmin } from '../src/lib/supabase.js';

const MIGRATIONS_DIR = join(process.cwd(), 'supabase/migrations');

async function main(): Promise<void> {
  const config = loadConfig();
  const supabase = createSupabaseAdmin(config);

  const files = readdirSync(MIGRATIONS_DIR)
    .filter((file) => file.endsWith('.sql'))
    .sort();

  for (const file of files) {
    const sql = readFileSync(join(MIGRATIONS_DIR, file), 'utf-8');
    logger.info({ file }, 'Applying migration');

    const { error } = await supabase.rpc('exec_sql', { sql });
    if (error !== null) {
      throw new Error(`Migration ${file} failed: ${error.message}`);
    }
  }

  logger.info({ count: files.length }, 'All migrations applied');
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Migration failed');
  process.exit(1);
});
