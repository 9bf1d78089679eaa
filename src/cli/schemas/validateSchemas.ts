import { z } from 'zod';

export const ValidateSchema = z.object({
  text: z.string(),
  evidence: z.string().min(1, 'Evidence file is required'),
});

export type ValidateInput = z.infer<typeof ValidateSchema>;

const EvidenceItemSchema = z
  .object({
    content: z.string(),
    metadata: z.record(z.unknown()).optional(),
  })
  .passthrough();

/** A bare list of evidence items, or the JSON printed by `search`. */
export const EvidenceFileSchema = z.union([
  z.array(EvidenceItemSchema),
  z.object({ results: z.array(EvidenceItemSchema) }).passthrough(),
]);
