import { z, type ZodError } from "zod";

// Blank multipart fields count as missing, so they fail coercion instead of becoming 0
const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const requiredText = z.string({ required_error: "Required" }).trim().min(1, "Required");

export const productFormSchema = z.object({
  name: requiredText,
  // May be empty but must be present
  description: z.string({ required_error: "Required" }),
  price: z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: "Price must be a number" })
      .finite()
      .nonnegative("Price cannot be negative"),
  ),
  category_id: z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: "Category must be a number" })
      .int()
      .positive(),
  ),
});

export const categoryFormSchema = z.object({
  name: requiredText,
});

export const loginSchema = z.object({
  username: requiredText,
  password: z.string({ required_error: "Required" }).min(1, "Required"),
});

export type ProductForm = z.infer<typeof productFormSchema>;
export type CategoryForm = z.infer<typeof categoryFormSchema>;

export function validationErrorBody(error: ZodError) {
  return {
    success: false,
    message: "Invalid form data",
    errors: error.flatten().fieldErrors,
  };
}
