import type pg from 'pg';
import type { EntityModel } from '../../src/postgres/index.js';
import type { Customer, Order } from './domain/entities.js';

export const DDL_CREATE_CUSTOMERS = `
CREATE TABLE IF NOT EXISTS customers (
  id          SERIAL        PRIMARY KEY,
  first_name  VARCHAR(250)  NOT NULL,
  last_name   VARCHAR(250)  NOT NULL,
  age         INTEGER       NOT NULL
)
`.trim();

export const DDL_CREATE_ORDERS = `
CREATE TABLE IF NOT EXISTS orders (
  id            SERIAL        PRIMARY KEY,
  order_number  VARCHAR(250)  NOT NULL,
  product_name  VARCHAR(250)  NOT NULL,
  date_time     TIMESTAMPTZ   NOT NULL,
  customer_id   INTEGER       NOT NULL REFERENCES customers (id)
)
`.trim();

export const DDL_CREATE_ORDERS_CUSTOMER_INDEX = `
CREATE INDEX IF NOT EXISTS idx_orders_customer_id
  ON orders (customer_id)
`.trim();

/**
 * Creates the tables when missing. Returns true when they were created by
 * this call, so the caller knows to seed.
 */
export async function ensureSchema(client: pg.ClientBase): Promise<boolean> {
  const existing = await client.query<{ present: boolean }>(
    "SELECT to_regclass('orders') IS NOT NULL AS present",
  );
  if (existing.rows[0]?.present === true) return false;

  await client.query(DDL_CREATE_CUSTOMERS);
  await client.query(DDL_CREATE_ORDERS);
  await client.query(DDL_CREATE_ORDERS_CUSTOMER_INDEX);
  return true;
}

export const customerModel: EntityModel<Customer> = {
  table: 'customers',
  primaryKey: 'id',
  columns: {
    id: 'id',
    firstName: 'first_name',
    lastName: 'last_name',
    age: 'age',
  },
  map: (record) => ({
    id: record.number('id'),
    firstName: record.string('firstName'),
    lastName: record.string('lastName'),
    age: record.number('age'),
  }),
};

export const orderModel: EntityModel<Order> = {
  table: 'orders',
  primaryKey: 'id',
  columns: {
    id: 'id',
    orderNumber: 'order_number',
    productName: 'product_name',
    dateTime: 'date_time',
    customerId: 'customer_id',
  },
  navigations: {
    customer: { target: customerModel, foreignKey: 'customer_id' },
  },
  map: (record) => {
    const order: Order = {
      id: record.number('id'),
      orderNumber: record.string('orderNumber'),
      productName: record.string('productName'),
      dateTime: record.date('dateTime'),
      customerId: record.number('customerId'),
    };
    const customer = record.navigation('customer', customerModel);
    return customer === undefined ? order : { ...order, customer };
  },
};
