#!/usr/bin/env node

// Точка входа CLI trag.
import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { indexCommand } from './commands/index-cmd.js';
import { searchCommand } from './commands/search-cmd.js';
import { evaluateCommand } from './commands/evaluate-cmd.js';
import { optimizeCommand } from './commands/optimize-cmd.js';
import { groundTruthCommand } from './commands/ground-truth-cmd.js';
import { ragEvalCommand } from './commands/rag-eval-cmd.js';
import { statusCommand } from './commands/status-cmd.js';

const program = new Command()
  .name('trag')
  .description('Transcript RAG — hybrid search and retrieval evaluation over video transcripts')
  .version('0.1.0');

program.addCommand(initCommand);
program.addCommand(indexCommand);
program.addCommand(searchCommand);
program.addCommand(evaluateCommand);
program.addCommand(optimizeCommand);
program.addCommand(groundTruthCommand);
program.addCommand(ragEvalCommand);
program.addCommand(statusCommand);

await program.parseAsync();
