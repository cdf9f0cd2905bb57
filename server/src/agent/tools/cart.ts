import type { TargetApiClient } from '../target-api.js';
import type { AddToCartInput } from '../tool-schemas.js';

export async function executeAddToCart(
  input: AddToCartInput,
  api: TargetApiClient,
  signal?: AbortSignal,
): Promise<unknown> {
  return api.request('POST', '/cart/add', {
    body: { item_id: input.item_id, quantity: input.quantity },
    signal,
  });
}

export async function executeGetCart(
  api: TargetApiClient,
  signal?: AbortSignal,
): Promise<unknown> {
  return api.request('GET', '/cart', { signal });
}
