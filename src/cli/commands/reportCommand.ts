import { Command } from 'commander';
import { executeHandler } from '../types.js';

export const reportCommand = new Command('report')
  .description('Summarize recorded search analytics per strategy')
  .option('--log <file>', 'Analytics log (default: REALTY_RAG_ANALYTICS_LOG or .realty-rag/analytics.jsonl)')
  .action(async (options) => {
    await executeHandler('report', { ...options });
  });
