import { describe, it, expect } from 'vitest';
import { ADMIN_DENIED_DETAIL, createMockShopApi, PRODUCTS } from '../mock-api/app.js';

function shop() {
  return createMockShopApi({ cartDelayMs: 0 });
}

async function postJson(app: ReturnType<typeof shop>, path: string, body: unknown) {
  return app.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('mock shop API', () => {
  it('reports health', async () => {
    const res = await shop().request('/health');
    expect(await res.json()).toEqual({ status: 'healthy', service: 'mock-api' });
  });

  it('lists five products with paging fields', async () => {
    const res = await shop().request('/products');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ products: PRODUCTS, total: 5, page: 1, per_page: 10 });
  });

  it('searches case-sensitively', async () => {
    const app = shop();
    const lower = await (await app.request('/search?q=laptop')).json();
    expect(lower).toEqual({ results: [], query: 'laptop', total: 0 });

    const exact = await (await app.request('/search?q=Laptop')).json() as { total: number; results: Array<{ id: number }> };
    expect(exact.total).toBe(1);
    expect(exact.results[0].id).toBe(1);
  });

  it('requires a search query', async () => {
    const res = await shop().request('/search');
    expect(res.status).toBe(422);
  });

  it('changes the cart/add response shape after the first call', async () => {
    const app = shop();
    const first = await postJson(app, '/cart/add', { item_id: 1, quantity: 1 });
    expect(await first.json()).toEqual({ cart: { items: [{ item_id: 1, quantity: 1 }], total_items: 1 } });

    const second = await postJson(app, '/cart/add', { item_id: 5, quantity: 2 });
    expect(await second.json()).toEqual({ message: 'Item added to cart successfully' });

    const cart = await app.request('/cart');
    expect(await cart.json()).toEqual({
      items: [{ item_id: 1, quantity: 1 }, { item_id: 5, quantity: 2 }],
      total: 2,
      message: 'Cart loaded successfully',
    });
  });

  it('keeps state per instance', async () => {
    const a = shop();
    const b = shop();
    await postJson(a, '/cart/add', { item_id: 1, quantity: 1 });

    const fromB = await postJson(b, '/cart/add', { item_id: 2, quantity: 1 });
    expect(await fromB.json()).toEqual({ cart: { items: [{ item_id: 2, quantity: 1 }], total_items: 1 } });
  });

  it('delays the cart read', async () => {
    const app = createMockShopApi({ cartDelayMs: 40 });
    const started = Date.now();
    await app.request('/cart');
    expect(Date.now() - started).toBeGreaterThanOrEqual(35);
  });

  it('reveals fees on the total cost endpoint', async () => {
    const res = await shop().request('/products/2/total_cost');
    const body = await res.json() as {
      product_id: number;
      base_price: number;
      fees: Array<{ type: string; amount: number }>;
      total_cost: number;
    };
    expect(body.product_id).toBe(2);
    expect(body.base_price).toBe(29.99);
    expect(body.fees.map((fee) => fee.type)).toEqual(['processing_fee', 'handling_fee', 'convenience_fee']);
    expect(body.fees[0].amount).toBeCloseTo(0.8997, 6);
    expect(body.total_cost).toBeCloseTo(39.3797, 6);
  });

  it('returns 404 for an unknown product and 422 for a non-integer id', async () => {
    const app = shop();
    const missing = await app.request('/products/42/total_cost');
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ detail: 'Product not found' });
    expect((await app.request('/products/abc/total_cost')).status).toBe(422);
  });

  it('demands an undocumented tax_id at checkout', async () => {
    const app = shop();
    const res = await postJson(app, '/checkout', { shipping_address: 'a', billing_address: 'b' });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      detail: {
        error: 'Missing required fields',
        required_fields: ['shipping_address', 'billing_address', 'tax_id'],
        missing: ['tax_id'],
      },
    });

    const ok = await postJson(app, '/checkout', { shipping_address: 'a', billing_address: 'b', tax_id: 'T-1' });
    expect(await ok.json()).toEqual({ message: 'Checkout successful', order_id: '12345' });
  });

  it('leaks internal detail from the admin endpoint', async () => {
    const res = await shop().request('/admin/users');
    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({ detail: ADMIN_DENIED_DETAIL });
  });
});
