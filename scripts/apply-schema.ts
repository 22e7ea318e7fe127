import 'dotenv/config';

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { Pool } from 'pg';

const SCHEMA_PATH = join(__dirname, '..', 'sql', 'schema.sql');

async function main() {
  const databaseUrl = process.env.DATABASE_URL;

  if (!databaseUrl) {
    throw new Error('DATABASE_URL is required');
  }

  const pool = new Pool({ connectionString: databaseUrl, max: 1 });

  try {
    await pool.query(readFileSync(SCHEMA_PATH, 'utf8'));
    console.log(`Applied ${SCHEMA_PATH}`);
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error('Applying schema failed:', error);
  process.exitCode = 1;
});
