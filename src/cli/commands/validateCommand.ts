import { Command } from 'commander';
import { executeHandler } from '../types.js';

export const validateCommand = new Command('validate')
  .description('Check a generated answer against retrieved evidence for unsupported claims')
  .argument('<text>', 'Generated answer text')
  .requiredOption('-e, --evidence <file>', 'JSON evidence file (array of { content } or a search result)')
  .action(async (text, options) => {
    await executeHandler('validate', { text, ...options });
  });
