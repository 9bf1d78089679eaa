import path from 'path';
import fs from 'fs-extra';
import type { z } from 'zod';
import type { EvidenceItem } from '../core/validation/hallucination';
import { EvidenceFileSchema } from './schemas/validateSchemas';
import { error, ErrorHints, ErrorReasons, type CLIError } from './types';

/**
 * Load validation evidence from disk.
 *
 * Accepts a JSON array of `{ content, metadata? }` objects, or the JSON
 * written by `realty-rag search` (anything with a `results` array).
 */
export async function readEvidenceFile(file: string): Promise<EvidenceItem[] | CLIError> {
  const evidencePath = path.resolve(file);
  if (!(await fs.pathExists(evidencePath))) {
    return error(ErrorReasons.EVIDENCE_NOT_FOUND, {
      message: `Evidence file not found: ${evidencePath}`,
      hint: ErrorHints.EVIDENCE_NOT_FOUND,
    });
  }

  let raw: unknown;
  try {
    raw = await fs.readJSON(evidencePath);
  } catch (e) {
    return error(ErrorReasons.EVIDENCE_INVALID, {
      message: `Evidence file is not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
      hint: ErrorHints.EVIDENCE_INVALID,
    });
  }

  const parsed = EvidenceFileSchema.safeParse(raw);
  if (!parsed.success) {
    return error(ErrorReasons.EVIDENCE_INVALID, {
      message: 'Evidence file has an unexpected shape',
      errors: formatIssues(parsed.error),
      hint: ErrorHints.EVIDENCE_INVALID,
    });
  }
  const items = Array.isArray(parsed.data) ? parsed.data : parsed.data.results;
  return items.map((item) => ({ content: item.content, ...(item.metadata ? { metadata: item.metadata } : {}) }));
}

export function formatIssues(err: z.ZodError): { path: string; message: string }[] {
  return err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}
