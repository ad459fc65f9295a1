import { describe, it, expect, vi } from 'vitest';
import pg from 'pg';
import { createSeed, insertSeed } from '../src/seed.js';

const now = new Date('2025-05-01T12:00:00Z');

function makeMockClient() {
  return { query: vi.fn().mockResolvedValue({ rows: [], rowCount: 0 }) };
}

describe('createSeed', () => {
  const seed = createSeed(now);

  it('creates three customers', () => {
    expect(seed.customers.map((c) => `${c.firstName} ${c.lastName} (${c.age})`)).toEqual([
      'John Doe (15)',
      'Petr Petrov (30)',
      'Pettr Pettrov (31)',
    ]);
  });

  it('dates orders one day apart up to now', () => {
    expect(seed.orders.map((o) => [o.productName, o.dateTime.toISOString(), o.customer?.firstName])).toEqual([
      ['Tomato', '2025-04-28T12:00:00.000Z', 'John'],
      ['Onion', '2025-04-29T12:00:00.000Z', 'John'],
      ['Banana', '2025-04-30T12:00:00.000Z', 'Petr'],
      ['Chery', '2025-05-01T12:00:00.000Z', 'Pettr'],
    ]);
  });

  it('links orders to customers by id', () => {
    expect(seed.orders.map((o) => o.customerId)).toEqual([1, 1, 2, 3]);
  });
});

describe('insertSeed', () => {
  it('inserts everything in one transaction', async () => {
    const client = makeMockClient();
    await insertSeed(client as unknown as pg.ClientBase, createSeed(now));

    const statements: unknown[] = client.query.mock.calls.map((args: unknown[]) => args[0]);
    expect(statements[0]).toBe('BEGIN');
    expect(statements.at(-1)).toBe('COMMIT');
    // 3 customers + 4 orders + 2 sequence resets
    expect(statements).toHaveLength(11);
    expect(client.query).toHaveBeenCalledWith(
      'INSERT INTO customers (id, first_name, last_name, age) VALUES ($1, $2, $3, $4)',
      [2, 'Petr', 'Petrov', 30],
    );
  });

  it('rolls back and rethrows on failure', async () => {
    const client = makeMockClient();
    const failure = new Error('duplicate key');
    client.query.mockResolvedValueOnce({ rows: [] }).mockRejectedValueOnce(failure);

    await expect(insertSeed(client as unknown as pg.ClientBase, createSeed(now))).rejects.toBe(failure);
    expect(client.query).toHaveBeenLastCalledWith('ROLLBACK');
  });
});
