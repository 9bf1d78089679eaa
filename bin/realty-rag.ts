#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { analyzeCommand } from '../src/cli/commands/analyzeCommand';
import { searchCommand } from '../src/cli/commands/searchCommand';
import { validateCommand } from '../src/cli/commands/validateCommand';
import { reportCommand } from '../src/cli/commands/reportCommand';

function findPackageJson(startDir: string): string | null {
  let dir = startDir;
  for (let i = 0; i < 10; i++) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

function readVersionFromPackageJson(): string {
  const pkgPath = findPackageJson(__dirname);
  if (!pkgPath) return '0.0.0';
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function main() {
  const program = new Command();
  program
    .name('realty-rag')
    .description('realty-rag: query routing, hybrid retrieval and answer validation for real-estate RAG')
    .version(readVersionFromPackageJson());

  program
    .addCommand(analyzeCommand)
    .addCommand(searchCommand)
    .addCommand(validateCommand)
    .addCommand(reportCommand);
  program.parse(process.argv);
}

main();
