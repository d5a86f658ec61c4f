import { z } from "zod";

export const categorySchema = z.object({
  id: z.number().int(),
  name: z.string(),
  image: z.string(),
});

export type Category = z.infer<typeof categorySchema>;
