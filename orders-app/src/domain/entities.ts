export interface Customer {
  id: number;
  firstName: string;
  lastName: string;
  age: number;
}

export interface Order {
  id: number;
  orderNumber: string;
  productName: string;
  dateTime: Date;
  customerId: number;
  /** Only populated when the query includes it. */
  customer?: Customer;
}
