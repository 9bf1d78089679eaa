import { loadRouterConfig } from '../../core/config';
import { validateResponse } from '../../core/validation/hallucination';
import { releaseAnswer } from '../../core/pipeline';
import { createLogger } from '../../core/log';
import type { CLIResult, CLIError } from '../types';
import { success, isCLIError } from '../types';
import { readEvidenceFile } from '../helpers';
import type { ValidateInput } from '../schemas/validateSchemas';

export async function handleValidate(input: ValidateInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'validate' });
  const config = loadRouterConfig(process.env);

  const evidence = await readEvidenceFile(input.evidence);
  if (isCLIError(evidence)) return evidence;

  const outcome = validateResponse(input.text, evidence, config.validation);
  const release = releaseAnswer(input.text, outcome);
  log.info('validate', {
    ok: true,
    passed: outcome.passed,
    confidence: Number(outcome.confidence.toFixed(3)),
    evidence: evidence.length,
    issues: outcome.issues.length,
  });
  return success({ outcome, release });
}
