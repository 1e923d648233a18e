export type ProductRecord = {
  id: number;
  name: string;
  description: string;
  price: number;
  stock: number;
};

export type ProductInput = Omit<ProductRecord, 'id'>;

const SEED_PRODUCTS: ProductInput[] = [
  { name: 'Laptop', description: 'High-performance laptop', price: 999.99, stock: 10 },
  { name: 'Mouse', description: 'Wireless mouse', price: 29.99, stock: 50 },
];

/** In-memory product catalogue backing the product service. */
export class ProductStore {
  private readonly products = new Map<number, ProductRecord>();
  private nextId = 1;

  constructor(seed: ProductInput[] = SEED_PRODUCTS) {
    for (const product of seed) {
      this.create(product);
    }
  }

  list(): ProductRecord[] {
    return [...this.products.values()];
  }

  get(id: number): ProductRecord | undefined {
    return this.products.get(id);
  }

  create(input: ProductInput): ProductRecord {
    const record = { ...input, id: this.nextId++ };
    this.products.set(record.id, record);
    return record;
  }

  update(id: number, input: ProductInput): ProductRecord | undefined {
    if (!this.products.has(id)) return undefined;
    const record = { ...input, id };
    this.products.set(id, record);
    return record;
  }

  remove(id: number): boolean {
    return this.products.delete(id);
  }
}
