import { z } from 'zod';

const roleEnum = z.enum(['investor', 'developer', 'buyer', 'agent', 'general']);

const filterOptions = {
  propertyType: z.string().trim().min(1).optional(),
  minPrice: z.coerce.number().nonnegative().optional(),
  maxPrice: z.coerce.number().nonnegative().optional(),
};

export const AnalyzeSchema = z.object({
  text: z.string(),
  ...filterOptions,
});

export const SearchSchema = z.object({
  text: z.string().min(1, 'Query text is required'),
  role: roleEnum.default('general'),
  ...filterOptions,
  topk: z.coerce.number().int().positive().max(200).optional(),
  timeoutMs: z.coerce.number().int().min(100).max(60_000).optional(),
});

export type AnalyzeInput = z.infer<typeof AnalyzeSchema>;
export type SearchInput = z.infer<typeof SearchSchema>;
