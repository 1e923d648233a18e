export type OrderRecord = {
  id: number;
  username: string;
  productId: number;
  productName: string;
  productPrice: number;
  quantity: number;
  totalPrice: number;
  createdAt: string;
};

export class OrderStore {
  private readonly orders = new Map<number, OrderRecord>();
  private nextId = 1;

  listForUser(username: string): OrderRecord[] {
    return [...this.orders.values()].filter((order) => order.username === username);
  }

  get(id: number): OrderRecord | undefined {
    return this.orders.get(id);
  }

  create(input: Omit<OrderRecord, 'id' | 'createdAt'>): OrderRecord {
    const record: OrderRecord = { ...input, id: this.nextId++, createdAt: new Date().toISOString() };
    this.orders.set(record.id, record);
    return record;
  }
}
