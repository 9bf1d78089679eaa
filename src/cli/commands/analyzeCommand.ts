import { Command } from 'commander';
import { executeHandler } from '../types.js';

export const analyzeCommand = new Command('analyze')
  .description('Extract entities, classify intent and pick a retrieval strategy without touching any store')
  .argument('<text>', 'Natural-language query')
  .option('--property-type <type>', 'Structured filter: property type')
  .option('--min-price <n>', 'Structured filter: minimum price')
  .option('--max-price <n>', 'Structured filter: maximum price')
  .action(async (text, options) => {
    await executeHandler('analyze', { text, ...options });
  });
