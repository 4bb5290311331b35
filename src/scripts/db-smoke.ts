import 'dotenv/config';
import { Client } from 'pg';

const SCHEMAS = ['hosting', 'quality', 'sync'];

(async () => {
  const client = new Client({
    connectionString: process.env.DATABASE_URL,
    ssl: { rejectUnauthorized: false },
  });
  await client.connect();

  try {
    const schemas = await client.query(
      'select schema_name from information_schema.schemata where schema_name = any($1) order by 1',
      [SCHEMAS],
    );
    console.log('Schemas:', schemas.rows);

    const tables = await client.query(
      'select table_schema, table_name from information_schema.tables where table_schema = any($1) order by 1,2',
      [SCHEMAS],
    );
    console.log('Tables:', tables.rows);

    const runs = await client.query(
      'select started_at, trigger, exit_code, target_count, failed_count from sync.sync_runs order by started_at desc limit 5',
    );
    console.log('Recent runs:', runs.rows);
  } finally {
    await client.end();
  }
})().catch((err: unknown) => {
  console.error('❌ DB smoke test failed:', err);
  process.exit(1);
});
