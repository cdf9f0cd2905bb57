import type { TargetApiClient } from '../target-api.js';
import type { ProductTotalCostInput, SearchProductsInput } from '../tool-schemas.js';

export async function executeGetProducts(
  api: TargetApiClient,
  signal?: AbortSignal,
): Promise<unknown> {
  return api.request('GET', '/products', { signal });
}

export async function executeSearchProducts(
  input: SearchProductsInput,
  api: TargetApiClient,
  signal?: AbortSignal,
): Promise<unknown> {
  return api.request('GET', '/search', { query: { q: input.q }, signal });
}

export async function executeGetProductTotalCost(
  input: ProductTotalCostInput,
  api: TargetApiClient,
  signal?: AbortSignal,
): Promise<unknown> {
  return api.request('GET', `/products/${input.product_id}/total_cost`, { signal });
}
