import { z } from "zod";

const MAX_VHOST_NAME_LENGTH = 256;

export const VirtualHostNameSchema = z
  .string({ required_error: "virtual host name is required" })
  .trim()
  .min(1, { message: "virtual host name is required" })
  .max(MAX_VHOST_NAME_LENGTH, {
    message: `virtual host name must not exceed ${MAX_VHOST_NAME_LENGTH} characters`,
  })
  // `#` separates the parts of application ids.
  .refine((value) => !value.includes("#"), {
    message: "virtual host name must not contain '#'",
  });

export const RenderQuerySchema = z.object({
  format: z.enum(["text", "xml"]).default("text"),
  defaults: z
    .enum(["include", "omit"])
    .default("include")
    .transform((value) => (value === "include" ? "include_defaults" : "omit_defaults")),
});
export type RenderQuery = z.infer<typeof RenderQuerySchema>;

/**
 * A virtual host definition as JSON. Keys match element names
 * case-insensitively, so `{ "name": ... }` and `{ "Name": ... }` are the same.
 */
export const VirtualHostDefinitionSchema = z.record(z.string(), z.unknown(), {
  invalid_type_error: "virtual host definition must be a JSON object",
});

export function formatValidationIssues(
  issues: z.ZodIssue[],
): Array<{ path: string; message: string }> {
  return issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
