import { z } from 'zod';

export const ReportSchema = z.object({
  log: z.string().optional(),
});

export type ReportInput = z.infer<typeof ReportSchema>;
