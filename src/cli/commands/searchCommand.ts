import { Command } from 'commander';
import { executeHandler } from '../types.js';

export const searchCommand = new Command('search')
  .description('Route a query to vector and/or graph retrieval and print fused, ranked evidence')
  .argument('<text>', 'Natural-language query')
  .option('-r, --role <role>', 'User role: investor|developer|buyer|agent|general', 'general')
  .option('-k, --topk <k>', 'Maximum fused results (default: REALTY_RAG_DEFAULT_LIMIT or 10)')
  .option('--property-type <type>', 'Structured filter: property type')
  .option('--min-price <n>', 'Structured filter: minimum price')
  .option('--max-price <n>', 'Structured filter: maximum price')
  .option('--timeout-ms <ms>', 'Per-executor timeout in milliseconds')
  .action(async (text, options) => {
    await executeHandler('search', { text, ...options });
  });
