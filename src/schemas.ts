import { z } from "zod";

export const RawSpanSchema = z
  .object({
    entity_type: z.string().trim().min(1),
    start: z.number().int().min(0),
    end: z.number().int().min(0),
    score: z.number().min(0).max(1),
    source_id: z.string(),
  })
  .refine((span) => span.start < span.end, {
    message: "start must be smaller than end",
    path: ["end"],
  });

/**
 * Serialized mappings are checked as `[entityType, [value, placeholder][]]`
 * entry lists built from own keys, since an object schema would drop a
 * value such as `__proto__`.
 */
export const SerializedMappingEntriesSchema = z.array(
  z.tuple([z.string(), z.array(z.tuple([z.string(), z.string()]))]),
);

export function describeZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
