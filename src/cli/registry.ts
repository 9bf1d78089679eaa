import { defineHandler, type RegisteredHandler } from './types';
import { AnalyzeSchema, SearchSchema } from './schemas/querySchemas';
import { handleAnalyze, handleSearch } from './handlers/queryHandlers';
import { ValidateSchema } from './schemas/validateSchemas';
import { handleValidate } from './handlers/validateHandlers';
import { ReportSchema } from './schemas/reportSchemas';
import { handleReport } from './handlers/reportHandlers';

/**
 * Registry of all CLI command handlers
 *
 * Maps command keys to their schema-validated handler.
 */
export const cliHandlers: Record<string, RegisteredHandler> = {
  analyze: defineHandler(AnalyzeSchema, handleAnalyze),
  search: defineHandler(SearchSchema, handleSearch),
  validate: defineHandler(ValidateSchema, handleValidate),
  report: defineHandler(ReportSchema, handleReport),
};
