import { z } from "zod";

export const productSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string(),
  price: z.number().nonnegative(),
  image: z.string(),
  category_id: z.number().int(),
  // Older records were written without a counter
  views: z.number().int().nonnegative().default(0),
});

export type Product = z.infer<typeof productSchema>;
