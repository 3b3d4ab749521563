/**
 * Zod schemas for type data files and cache snapshots
 * Provides runtime type safety for everything read back from disk
 */

import { z } from "zod";

const StringListSchema = z.array(z.string());

/**
 * Mapping form of one descriptor
 *
 * Content-type syntax and encoding values are checked by the descriptor
 * itself so that they raise the dedicated registry errors.
 */
export const MimeTypeRecordSchema = z
  .object({
    "content-type": z.string().min(1, "content-type must be non-empty"),
    docs: z.string().optional(),
    friendly: z.record(z.string(), z.string()).optional(),
    encoding: z.string().optional(),
    extensions: StringListSchema.optional(),
    "preferred-extension": z.string().optional(),
    obsolete: z.boolean().optional(),
    "use-instead": z.string().optional(),
    xrefs: z.record(z.string(), StringListSchema).optional(),
    registered: z.boolean().optional(),
    signature: z.boolean().optional(),
  })
  .strict();

export type MimeTypeRecord = z.infer<typeof MimeTypeRecordSchema>;

/**
 * A data file holds an array of records
 */
export const DataFileSchema = z.array(MimeTypeRecordSchema);

/**
 * Envelope fields checked before the payload is trusted
 */
export const CacheHeaderSchema = z.object({
  version: z.string(),
  digest: z.string().regex(/^[0-9a-f]{64}$/, "digest must be a sha256 hex string"),
});

export const CacheEnvelopeSchema = CacheHeaderSchema.extend({
  types: DataFileSchema,
}).strict();

export type CacheEnvelope = z.infer<typeof CacheEnvelopeSchema>;

/**
 * Format a zod error as a single line
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
