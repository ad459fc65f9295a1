import type pg from 'pg';
import type { Customer, Order } from './domain/entities.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface OrdersSeed {
  customers: Customer[];
  orders: Order[];
}

/** Three customers and four orders, one per day from three days ago up to `now`. */
export function createSeed(now: Date): OrdersSeed {
  const john: Customer = { id: 1, firstName: 'John', lastName: 'Doe', age: 15 };
  const petr: Customer = { id: 2, firstName: 'Petr', lastName: 'Petrov', age: 30 };
  const pettr: Customer = { id: 3, firstName: 'Pettr', lastName: 'Pettrov', age: 31 };

  const order = (id: number, productName: string, daysAgo: number, customer: Customer): Order => ({
    id,
    orderNumber: '1',
    productName,
    dateTime: new Date(now.getTime() - daysAgo * DAY_MS),
    customerId: customer.id,
    customer,
  });

  return {
    customers: [john, petr, pettr],
    orders: [
      order(1, 'Tomato', 3, john),
      order(2, 'Onion', 2, john),
      order(3, 'Banana', 1, petr),
      order(4, 'Chery', 0, pettr),
    ],
  };
}

export async function insertSeed(client: pg.ClientBase, seed: OrdersSeed): Promise<void> {
  await client.query('BEGIN');
  try {
    for (const customer of seed.customers) {
      await client.query(
        'INSERT INTO customers (id, first_name, last_name, age) VALUES ($1, $2, $3, $4)',
        [customer.id, customer.firstName, customer.lastName, customer.age],
      );
    }
    for (const order of seed.orders) {
      await client.query(
        `INSERT INTO orders (id, order_number, product_name, date_time, customer_id)
         VALUES ($1, $2, $3, $4, $5)`,
        [order.id, order.orderNumber, order.productName, order.dateTime, order.customerId],
      );
    }
    // Explicit ids leave the SERIAL sequences behind
    await client.query("SELECT setval(pg_get_serial_sequence('customers', 'id'), (SELECT MAX(id) FROM customers))");
    await client.query("SELECT setval(pg_get_serial_sequence('orders', 'id'), (SELECT MAX(id) FROM orders))");
    await client.query('COMMIT');
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  }
}
