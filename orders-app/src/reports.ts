import {
  eq,
  lambda,
  prop,
  whereAndConditions,
  whereAnyPropertyContainsText,
  whereDateTimeBetween,
  whereOrConditions,
} from '../../src/index.js';
import type { Queryable } from '../../src/index.js';
import type { Order } from './domain/entities.js';

export const isJohnsOrder = lambda<Order, boolean>('o', (o) => eq(prop(o, 'customer', 'firstName'), 'John'));
export const isOnionOrder = lambda<Order, boolean>('o', (o) => eq(prop(o, 'productName'), 'Onion'));
export const orderDate = lambda<Order, Date>('x', (x) => prop(x, 'dateTime'));
export const customerFirstName = lambda<Order, string>('o', (o) => prop(o, 'customer', 'firstName'));
export const productName = lambda<Order, string>('o', (o) => prop(o, 'productName'));

export interface ReportOptions {
  from: Date;
  to: Date;
  searchText: string;
}

export interface OrderReports {
  withOrConditions: Order[];
  withAndConditions: Order[];
  inDateTimeRange: Order[];
  withPropertiesContainingText: Order[];
}

export async function runOrderReports(orders: Queryable<Order>, options: ReportOptions): Promise<OrderReports> {
  const withCustomer = orders.include('customer');

  const withOrConditions = await whereOrConditions(withCustomer, isJohnsOrder, isOnionOrder).toList();
  const withAndConditions = await whereAndConditions(withCustomer, isJohnsOrder, isOnionOrder).toList();
  const inDateTimeRange = await whereDateTimeBetween(orders, orderDate, options.from, options.to).toList();
  const withPropertiesContainingText = await whereAnyPropertyContainsText(
    withCustomer,
    options.searchText,
    customerFirstName,
    productName,
  ).toList();

  return { withOrConditions, withAndConditions, inDateTimeRange, withPropertiesContainingText };
}

export function describeOrders(orders: readonly Order[]): string {
  return orders.length === 0 ? '(none)' : orders.map((order) => order.productName).join(', ');
}
