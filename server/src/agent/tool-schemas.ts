import { z } from 'zod';

// Models often quote integers ("2"); accept digit strings, reject everything else
const integer = z.preprocess(
  (value) => (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value) ? Number(value) : value),
  z.number().int(),
);

export const toolSchemas = {
  get_products: z.object({}).strict(),

  search_products: z.object({
    q: z.string(),
  }).strict(),

  add_to_cart: z.object({
    item_id: integer,
    quantity: integer,
  }).strict(),

  get_cart: z.object({}).strict(),

  get_product_total_cost: z.object({
    product_id: integer,
  }).strict(),

  checkout: z.object({
    shipping_address: z.string(),
    billing_address: z.string(),
  }).strict(),
};

export type ShopToolName = keyof typeof toolSchemas;

export type SearchProductsInput = z.infer<typeof toolSchemas.search_products>;
export type AddToCartInput = z.infer<typeof toolSchemas.add_to_cart>;
export type ProductTotalCostInput = z.infer<typeof toolSchemas.get_product_total_cost>;
export type CheckoutInput = z.infer<typeof toolSchemas.checkout>;
