import { Pool, PoolClient, QueryResultRow } from 'pg';
import { config } from '../config';

export const pool = new Pool({
  host: config.database.host,
  port: config.database.port,
  database: config.database.name,
  user: config.database.user,
  password: config.database.password,
  // One run, one connection
  max: 1,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
});

pool.on('error', (err) => {
  console.error('Unexpected error on idle client', err);
});

export const query = async <R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) => {
  const start = Date.now();
  try {
    const res = await pool.query<R>(text, params);
    const duration = Date.now() - start;
    // Log only slow queries (>500ms)
    if (duration > 500) {
      console.log('⚠️ Slow query', { text: text.substring(0, 80), duration, rows: res.rowCount });
    }
    return res;
  } catch (error) {
    console.error('Database query error:', error);
    throw error;
  }
};

/**
 * Run `work` inside BEGIN/COMMIT on a single client, rolling back on failure.
 */
export const withTransaction = async <T>(work: (client: PoolClient) => Promise<T>): Promise<T> => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      console.error('Rollback failed:', rollbackError);
    });
    throw error;
  } finally {
    client.release();
  }
};

export const INPUT_TABLES = ['session_sources', 'conversions', 'session_costs'] as const;

// Output tables only; the input tables belong to upstream ingestion
export const initDatabase = async () => {
  try {
    await query(`
      CREATE TABLE IF NOT EXISTS attribution_customer_journey (
        conv_id VARCHAR(255) NOT NULL,
        session_id VARCHAR(255) NOT NULL,
        ihc DOUBLE PRECISION NOT NULL,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        PRIMARY KEY (conv_id, session_id)
      );
    `);

    await query(`
      CREATE INDEX IF NOT EXISTS idx_acj_session_id
      ON attribution_customer_journey(session_id);
    `);

    await query(`
      CREATE TABLE IF NOT EXISTS channel_reporting (
        channel_name VARCHAR(255) NOT NULL,
        date DATE NOT NULL,
        cost DOUBLE PRECISION NOT NULL,
        ihc DOUBLE PRECISION NOT NULL,
        ihc_revenue DOUBLE PRECISION NOT NULL,
        "CPO" DOUBLE PRECISION,
        "ROAS" DOUBLE PRECISION,
        PRIMARY KEY (channel_name, date)
      );
    `);

    await query(`
      CREATE TABLE IF NOT EXISTS error_logs (
        id SERIAL PRIMARY KEY,
        type VARCHAR(50),
        message TEXT,
        stack TEXT,
        metadata TEXT,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      );
    `);

    await query(`
      CREATE INDEX IF NOT EXISTS idx_error_logs_created
      ON error_logs(created_at);
    `);

    const existing = await query<{ table_name: string }>(
      `SELECT table_name FROM information_schema.tables
       WHERE table_schema = current_schema() AND table_name = ANY($1)`,
      [INPUT_TABLES]
    );
    const found = new Set(existing.rows.map((row) => row.table_name));
    const missing = INPUT_TABLES.filter((table) => !found.has(table));
    if (missing.length > 0) {
      throw new Error(`Missing input tables: ${missing.join(', ')}`);
    }

    console.log('✅ Database tables initialized successfully');
  } catch (error) {
    console.error('❌ Error initializing database:', error);
    throw error;
  }
};
