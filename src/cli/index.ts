#!/usr/bin/env node
import { loadEnvFile } from '../config/index.js';
import { handleError } from '../utils/errors.js';
import { createProgram } from './program.js';

async function run(): Promise<void> {
  loadEnvFile();
  const program = createProgram();

  if (!process.argv.slice(2).length) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(process.argv);
}

run().catch(handleError);
