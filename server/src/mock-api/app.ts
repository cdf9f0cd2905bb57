import { Hono } from 'hono';

/**
 * A small shop API with deliberate usability and design flaws, used as the
 * default target for persona runs and as the in-process target in tests.
 *
 * Flaws: case-sensitive search, a cart/add response whose shape changes after
 * the first call, a slow cart read, fees only visible on a separate endpoint,
 * an undocumented required checkout field, and an admin endpoint whose error
 * leaks internal details.
 */

export interface Product {
  id: number;
  name: string;
  price: number;
  description: string;
  category: string;
}

export const PRODUCTS: readonly Product[] = [
  {
    id: 1,
    name: 'Gaming Laptop',
    price: 1299.99,
    description: 'High-performance gaming laptop with RTX graphics',
    category: 'Electronics',
  },
  {
    id: 2,
    name: 'Wireless Mouse',
    price: 29.99,
    description: 'Ergonomic wireless mouse with precision tracking',
    category: 'Accessories',
  },
  {
    id: 3,
    name: 'Mechanical Keyboard',
    price: 149.99,
    description: 'RGB mechanical keyboard with tactile switches',
    category: 'Accessories',
  },
  {
    id: 4,
    name: '4K Monitor',
    price: 399.99,
    description: '27-inch 4K UHD monitor with HDR support',
    category: 'Electronics',
  },
  {
    id: 5,
    name: 'USB-C Hub',
    price: 79.99,
    description: 'Multi-port USB-C hub with HDMI and Ethernet',
    category: 'Accessories',
  },
];

export const CHECKOUT_REQUIRED_FIELDS = ['shipping_address', 'billing_address', 'tax_id'] as const;

export const ADMIN_DENIED_DETAIL =
  'Access denied. Admin database connection requires elevated privileges. Contact system administrator for user table access.';

export interface MockShopOptions {
  /** Artificial latency of GET /cart */
  cartDelayMs?: number;
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readJsonObject(req: Request): Promise<JsonObject | null> {
  try {
    const body: unknown = await req.json();
    return isJsonObject(body) ? body : null;
  } catch {
    return null;
  }
}

function delay(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function hiddenFees(basePrice: number) {
  return [
    { type: 'processing_fee', amount: basePrice * 0.03 },
    { type: 'handling_fee', amount: 5.99 },
    { type: 'convenience_fee', amount: 2.5 },
  ];
}

/** Each call builds an independent shop: its own cart and its own add counter. */
export function createMockShopApi(options: MockShopOptions = {}): Hono {
  const cartDelayMs = options.cartDelayMs ?? 2_500;
  const cartItems: JsonObject[] = [];
  let cartAddCount = 0;

  const app = new Hono();

  app.get('/health', (c) => c.json({ status: 'healthy', service: 'mock-api' }));

  app.get('/products', (c) => c.json({
    products: [...PRODUCTS],
    total: PRODUCTS.length,
    page: 1,
    per_page: 10,
  }));

  app.get('/search', (c) => {
    const q = c.req.query('q');
    if (q === undefined) {
      return c.json({ detail: [{ loc: ['query', 'q'], msg: 'Field required', type: 'missing' }] }, 422);
    }
    // Case-sensitive on purpose
    const results = PRODUCTS.filter((product) => product.name.includes(q));
    return c.json({ results, query: q, total: results.length });
  });

  app.post('/cart/add', async (c) => {
    const item = await readJsonObject(c.req.raw);
    if (!item) {
      return c.json({ detail: 'Request body must be a JSON object' }, 422);
    }

    cartAddCount += 1;
    cartItems.push(item);

    // Only the first call returns the cart; later calls return a bare message
    if (cartAddCount === 1) {
      return c.json({ cart: { items: cartItems, total_items: cartItems.length } });
    }
    return c.json({ message: 'Item added to cart successfully' });
  });

  app.get('/cart', async (c) => {
    await delay(cartDelayMs);
    return c.json({ items: cartItems, total: cartItems.length, message: 'Cart loaded successfully' });
  });

  app.post('/checkout', async (c) => {
    const data = await readJsonObject(c.req.raw);
    if (!data) {
      return c.json({ detail: 'Request body must be a JSON object' }, 422);
    }

    const missing = CHECKOUT_REQUIRED_FIELDS.filter((field) => !(field in data));
    if (missing.length > 0) {
      return c.json({
        detail: {
          error: 'Missing required fields',
          required_fields: [...CHECKOUT_REQUIRED_FIELDS],
          missing,
        },
      }, 400);
    }

    return c.json({ message: 'Checkout successful', order_id: '12345' });
  });

  app.get('/admin/users', (c) => c.json({ detail: ADMIN_DENIED_DETAIL }, 403));

  app.get('/products/:id/total_cost', (c) => {
    const raw = c.req.param('id');
    if (!/^-?\d+$/.test(raw)) {
      return c.json({ detail: [{ loc: ['path', 'product_id'], msg: 'Input should be a valid integer', type: 'int_parsing' }] }, 422);
    }
    const productId = Number(raw);
    const product = PRODUCTS.find((p) => p.id === productId);
    if (!product) {
      return c.json({ detail: 'Product not found' }, 404);
    }

    const fees = hiddenFees(product.price);
    const totalFees = fees.reduce((sum, fee) => sum + fee.amount, 0);
    return c.json({
      product_id: productId,
      base_price: product.price,
      fees,
      total_cost: product.price + totalFees,
    });
  });

  app.notFound((c) => c.json({ detail: 'Not Found' }, 404));

  return app;
}
