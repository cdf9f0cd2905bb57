import { TargetApiClient, type FetchLike } from '../target-api.js';
import { toolSchemas } from '../tool-schemas.js';
import { defineTool, ToolRegistry, type ToolDefinition } from '../tool-registry.js';
import { executeGetProducts, executeGetProductTotalCost, executeSearchProducts } from './catalog.js';
import { executeAddToCart, executeGetCart } from './cart.js';
import { executeCheckout } from './checkout.js';

/** Shop operations in catalog order. */
export function createShopTools(api: TargetApiClient): ToolDefinition[] {
  return [
    defineTool({
      name: 'get_products',
      description: 'get_products(): Lists all available products.',
      schema: toolSchemas.get_products,
      execute: (_input, signal) => executeGetProducts(api, signal),
    }),
    defineTool({
      name: 'search_products',
      description: 'search_products(q: str): Searches for products by a query string.',
      schema: toolSchemas.search_products,
      execute: (input, signal) => executeSearchProducts(input, api, signal),
    }),
    defineTool({
      name: 'add_to_cart',
      description: 'add_to_cart(item_id: int, quantity: int): Adds a specific product to the cart.',
      schema: toolSchemas.add_to_cart,
      execute: (input, signal) => executeAddToCart(input, api, signal),
    }),
    defineTool({
      name: 'get_cart',
      description: 'get_cart(): Retrieves the current contents of the shopping cart.',
      schema: toolSchemas.get_cart,
      execute: (_input, signal) => executeGetCart(api, signal),
    }),
    defineTool({
      name: 'get_product_total_cost',
      description: 'get_product_total_cost(product_id: int): Gets the full cost of a single product, including all fees.',
      schema: toolSchemas.get_product_total_cost,
      execute: (input, signal) => executeGetProductTotalCost(input, api, signal),
    }),
    defineTool({
      name: 'checkout',
      description: 'checkout(shipping_address: str, billing_address: str): Attempts to complete the purchase.',
      schema: toolSchemas.checkout,
      execute: (input, signal) => executeCheckout(input, api, signal),
    }),
  ];
}

export interface ShopRegistryOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export function createShopToolRegistry(options: ShopRegistryOptions): ToolRegistry {
  return new ToolRegistry(createShopTools(new TargetApiClient(options)));
}
