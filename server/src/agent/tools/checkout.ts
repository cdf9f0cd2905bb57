import type { TargetApiClient } from '../target-api.js';
import type { CheckoutInput } from '../tool-schemas.js';

/**
 * Sends only the two documented address fields. Targets that demand more
 * (the mock shop wants a tax_id) answer with a 400 the agent has to reason about.
 */
export async function executeCheckout(
  input: CheckoutInput,
  api: TargetApiClient,
  signal?: AbortSignal,
): Promise<unknown> {
  return api.request('POST', '/checkout', {
    body: { shipping_address: input.shipping_address, billing_address: input.billing_address },
    signal,
  });
}
