import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { createMockShopApi, PRODUCTS } from '../mock-api/app.js';
import type { FetchLike } from '../agent/target-api.js';
import { defineTool, ToolRegistry } from '../agent/tool-registry.js';
import { createShopToolRegistry } from '../agent/tools/index.js';

const BASE_URL = 'http://shop.test';

function shopRegistry(fetchImpl?: FetchLike, timeoutMs = 5_000) {
  const shop = createMockShopApi({ cartDelayMs: 0 });
  const routed: FetchLike = async (input, init) => shop.request(input, init);
  return createShopToolRegistry({ baseUrl: BASE_URL, timeoutMs, fetchImpl: fetchImpl ?? routed });
}

function parse(text: string): Record<string, unknown> {
  return JSON.parse(text) as Record<string, unknown>;
}

describe('ToolRegistry catalog', () => {
  it('describes the six shop operations in declared order', () => {
    const registry = shopRegistry();
    expect(registry.describeCapabilities()).toBe([
      'get_products(): Lists all available products.',
      'search_products(q: str): Searches for products by a query string.',
      'add_to_cart(item_id: int, quantity: int): Adds a specific product to the cart.',
      'get_cart(): Retrieves the current contents of the shopping cart.',
      'get_product_total_cost(product_id: int): Gets the full cost of a single product, including all fees.',
      'checkout(shipping_address: str, billing_address: str): Attempts to complete the purchase.',
    ].join('\n'));
  });

  it('never lists the admin operation', () => {
    const registry = shopRegistry();
    expect(registry.describeCapabilities()).not.toContain('admin');
    expect(registry.names()).not.toContain('admin_users');
  });

  it('rejects duplicate and omitted names at registration', () => {
    const tool = defineTool({
      name: 'ping',
      description: 'ping(): Pings.',
      schema: z.object({}),
      execute: async () => ({ pong: true }),
    });
    const registry = new ToolRegistry([tool]);
    expect(() => registry.register(tool)).toThrow("Tool 'ping' is already registered");
    expect(() => registry.register({ ...tool, name: 'admin_users' })).toThrow(
      "Tool 'admin_users' must stay out of the catalog",
    );
  });
});

describe('ToolRegistry.invoke', () => {
  it('returns the not-found envelope for unknown names', async () => {
    const registry = shopRegistry();
    await expect(registry.invoke('nonexistent_tool', {})).resolves.toBe(
      `{"error": "Tool 'nonexistent_tool' not found."}`,
    );
  });

  it('escapes odd tool names inside the not-found envelope', async () => {
    const text = await new ToolRegistry([]).invoke('say "hi"', {});
    expect(text).toBe('{"error": "Tool \'say \\"hi\\"\' not found."}');
    expect(JSON.parse(text)).toEqual({ error: 'Tool \'say "hi"\' not found.' });
  });

  it('serializes results as indented JSON', async () => {
    const registry = shopRegistry();
    const result = await registry.invoke('get_products', {});
    expect(result).toBe(JSON.stringify({ products: PRODUCTS, total: 5, page: 1, per_page: 10 }, null, 2));
  });

  it('passes the search query through unchanged', async () => {
    const registry = shopRegistry();
    expect(parse(await registry.invoke('search_products', { q: 'mouse' }))).toEqual({
      results: [],
      query: 'mouse',
      total: 0,
    });
    expect(parse(await registry.invoke('search_products', { q: 'Mouse' })).total).toBe(1);
  });

  it('coerces quoted integers for cart operations', async () => {
    const registry = shopRegistry();
    const first = parse(await registry.invoke('add_to_cart', { item_id: '2', quantity: 1 }));
    expect(first).toEqual({ cart: { items: [{ item_id: 2, quantity: 1 }], total_items: 1 } });

    const second = parse(await registry.invoke('add_to_cart', { item_id: 3, quantity: 2 }));
    expect(second).toEqual({ message: 'Item added to cart successfully' });

    const cart = await registry.invoke('get_cart', {});
    expect(cart).toBe(JSON.stringify({
      items: [{ item_id: 2, quantity: 1 }, { item_id: 3, quantity: 2 }],
      total: 2,
      message: 'Cart loaded successfully',
    }, null, 2));
  });

  it('turns argument mismatches into an Exception observation', async () => {
    const registry = shopRegistry();
    const result = parse(await registry.invoke('add_to_cart', { item_id: 'two' }));
    expect(result.error).toBe('Exception');
    expect(String(result.details).startsWith('Invalid arguments for add_to_cart: item_id: ')).toBe(true);
  });

  it('rejects arguments the operation does not declare', async () => {
    const registry = shopRegistry();
    const result = parse(await registry.invoke('checkout', {
      shipping_address: '1 Main St',
      billing_address: '1 Main St',
      tax_id: 'T-1',
    }));
    expect(result).toEqual({
      error: 'Exception',
      details: "Invalid arguments for checkout: (root): Unrecognized key(s) in object: 'tax_id'",
    });
  });

  it('reports HTTP failures with the status and raw body', async () => {
    const registry = shopRegistry();
    const result = parse(await registry.invoke('checkout', {
      shipping_address: '1 Main St',
      billing_address: '1 Main St',
    }));
    expect(result).toEqual({
      error: 'HTTPError',
      status_code: 400,
      details: '{"detail":{"error":"Missing required fields","required_fields":["shipping_address","billing_address","tax_id"],"missing":["tax_id"]}}',
    });
  });

  it('reports unknown products as a 404 observation', async () => {
    const registry = shopRegistry();
    expect(parse(await registry.invoke('get_product_total_cost', { product_id: 99 }))).toEqual({
      error: 'HTTPError',
      status_code: 404,
      details: '{"detail":"Product not found"}',
    });
  });

  it('reports network faults as an Exception observation', async () => {
    const failing = vi.fn<FetchLike>(async () => {
      throw new TypeError('fetch failed');
    });
    const registry = shopRegistry(failing);
    expect(parse(await registry.invoke('get_products', {}))).toEqual({ error: 'Exception', details: 'fetch failed' });
    expect(failing).toHaveBeenCalledWith('http://shop.test/products', expect.objectContaining({ method: 'GET' }));
  });

  it('reports a timeout when the target never answers', async () => {
    const hanging: FetchLike = (_input, init) => new Promise((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
    const registry = shopRegistry(hanging, 20);
    expect(parse(await registry.invoke('get_cart', {}))).toEqual({
      error: 'Exception',
      details: 'Timed out after 20ms',
    });
  });

  it('reports an undecodable success body as an Exception observation', async () => {
    const htmlOnly: FetchLike = async () => new Response('<html>ok</html>', { status: 200 });
    const registry = shopRegistry(htmlOnly);
    expect(parse(await registry.invoke('get_products', {})).error).toBe('Exception');
  });
});
