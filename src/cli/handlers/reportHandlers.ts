import path from 'path';
import fs from 'fs-extra';
import { loadRouterConfig } from '../../core/config';
import { JsonlAnalyticsLog, buildPerformanceReport } from '../../core/analytics';
import { createLogger } from '../../core/log';
import type { CLIResult, CLIError } from '../types';
import { success, error, ErrorReasons, ErrorHints } from '../types';
import type { ReportInput } from '../schemas/reportSchemas';

export async function handleReport(input: ReportInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'report' });
  const logPath = path.resolve(input.log ?? loadRouterConfig(process.env).stores.analyticsLog);

  if (!(await fs.pathExists(logPath))) {
    return error(ErrorReasons.LOG_NOT_FOUND, {
      message: `Analytics log not found: ${logPath}`,
      hint: ErrorHints.LOG_NOT_FOUND,
    });
  }

  const records = await new JsonlAnalyticsLog(logPath, log).readAll();
  const report = buildPerformanceReport(records);
  log.info('report', { ok: true, log: logPath, records: records.length });
  return success({ log: logPath, report });
}
