import pg from 'pg';
import { PostgresDataContext } from '../../src/postgres/index.js';
import { systemClock } from './domain/clock.js';
import { describeOrders, runOrderReports } from './reports.js';
import { ensureSchema, orderModel } from './schema.js';
import { createSeed, insertSeed } from './seed.js';

const DATABASE_URL = process.env['DATABASE_URL'];
if (!DATABASE_URL) {
  console.error('Error: DATABASE_URL environment variable is required');
  process.exit(1);
}

const LOG_SQL = process.env['LOG_SQL'] === '1';
const SEARCH_TEXT = process.env['SEARCH_TEXT'] ?? 'e';

const now = systemClock.now();
const from = process.env['REPORT_FROM'] !== undefined
  ? new Date(process.env['REPORT_FROM'])
  : new Date(now.getTime() - 60 * 60 * 60 * 1000);
if (Number.isNaN(from.getTime())) {
  console.error(`Error: REPORT_FROM is not a valid date: ${process.env['REPORT_FROM']}`);
  process.exit(1);
}

const pool = new pg.Pool({ connectionString: DATABASE_URL });
const db = new PostgresDataContext({
  pool,
  onQuery: LOG_SQL ? ({ sql, params }) => console.log(`[sql] ${sql}\n[sql] params: ${JSON.stringify(params)}`) : undefined,
});

try {
  const client = await pool.connect();
  try {
    if (await ensureSchema(client)) {
      await insertSeed(client, createSeed(now));
      console.log('[orders] schema created and seeded');
    }
  } finally {
    client.release();
  }

  const reports = await runOrderReports(db.set(orderModel), { from, to: now, searchText: SEARCH_TEXT });
  console.log(`[orders] John's orders or onions: ${describeOrders(reports.withOrConditions)}`);
  console.log(`[orders] John's onions: ${describeOrders(reports.withAndConditions)}`);
  console.log(`[orders] ordered since ${from.toISOString()}: ${describeOrders(reports.inDateTimeRange)}`);
  console.log(`[orders] containing "${SEARCH_TEXT}": ${describeOrders(reports.withPropertiesContainingText)}`);
} catch (err) {
  console.error('[orders] failed:', err);
  process.exitCode = 1;
} finally {
  await db.close();
}
