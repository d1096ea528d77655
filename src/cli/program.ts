import { Command } from 'commander';
import type { Server } from 'http';
import { parseLookupInput } from '../clean-hands/input.js';
import type { LookupInput, WorkflowResult } from '../clean-hands/types.js';
import { runWorkflow } from '../clean-hands/workflow.js';
import { loadConfig } from '../config/index.js';
import type { AppConfig } from '../config/types.js';
import { downloadPdf, type DownloadPdfOptions, type DownloadPdfResult } from '../download/downloader.js';
import { startServer } from '../server/app.js';
import { InvalidInputError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { CheckCommandOptions, FetchPdfCommandOptions, ServeCommandOptions } from './types.js';

const MAX_TIMEOUT_MS = 300_000;

export interface CliDependencies {
  runWorkflow?: (input: LookupInput, config: AppConfig) => Promise<WorkflowResult>;
  startServer?: (config: AppConfig) => Promise<Server>;
  downloadPdf?: (url: string, outputPath: string, options?: DownloadPdfOptions) => Promise<DownloadPdfResult>;
  print?: (line: string) => void;
  env?: NodeJS.ProcessEnv;
}

export function parseTimeoutMs(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw InvalidInputError.fromOption('--timeout-ms', value, 'a positive integer');
  }

  if (parsed > MAX_TIMEOUT_MS) {
    getLogger().warn(`--timeout-ms ${parsed}ms exceeds maximum of ${MAX_TIMEOUT_MS}ms, capping to ${MAX_TIMEOUT_MS}ms`);
    return MAX_TIMEOUT_MS;
  }
  return parsed;
}

export function parsePort(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
    throw InvalidInputError.fromOption('--port', value, 'an integer between 1 and 65535');
  }
  return parsed;
}

export function createProgram(deps: CliDependencies = {}): Command {
  const runner = deps.runWorkflow ?? runWorkflow;
  const serve = deps.startServer ?? ((config: AppConfig) => startServer(config));
  const download = deps.downloadPdf ?? downloadPdf;
  const print = deps.print ?? ((line: string) => console.log(line));
  const env = deps.env ?? process.env;

  const program = new Command();

  program
    .name('clean-hands')
    .description('Look up a DC Certificate of Clean Hands and capture the certificate or notice PDF')
    .version('0.1.0');

  program
    .command('check')
    .description('Run one lookup and capture the document')
    .requiredOption('--notice <number>', 'Notice number (e.g., L0012345678)')
    .requiredOption('--last4 <digits>', 'Last four digits of the taxpayer ID')
    .option('--headful', 'Run browser in headful mode (default: headless)')
    .option('--no-screenshots', 'Skip landing and result screenshots')
    .option('--artifacts-dir <dir>', 'Directory for PDFs, screenshots and run reports')
    .option('--timeout-ms <number>', `Navigation timeout in milliseconds (max: ${MAX_TIMEOUT_MS})`, parseTimeoutMs)
    .option('--verbose', 'Enable verbose logging')
    .action(async (options: CheckCommandOptions) => {
      const input = parseLookupInput({ notice: options.notice, last4: options.last4 });
      const config = loadConfig(
        {
          artifactsDir: options.artifactsDir,
          screenshots: options.screenshots,
          headless: options.headful ? false : undefined,
          verbose: options.verbose,
          timeouts: options.timeoutMs ? { navigationMs: options.timeoutMs } : undefined,
        },
        env
      );
      getLogger({ verbose: config.verbose });

      const result = await runner(input, config);

      print('-- Run complete --');
      print(`Visited URLs: ${result.urls.join(', ')}`);
      print(`Status: ${result.status}`);
      print(`PDF path: ${result.pdfPath ?? 'none'}`);
      print(`Result JSON:\n${JSON.stringify(result, null, 2)}`);
    });

  program
    .command('serve')
    .description('Start the HTTP API')
    .option('--port <number>', 'Port to listen on (default: $PORT or 8000)', parsePort)
    .option('--artifacts-dir <dir>', 'Directory for PDFs and run reports')
    .option('--verbose', 'Enable verbose logging')
    .action(async (options: ServeCommandOptions) => {
      const config = loadConfig(
        { port: options.port, artifactsDir: options.artifactsDir, verbose: options.verbose },
        env
      );
      getLogger({ verbose: config.verbose });
      await serve(config);
    });

  program
    .command('fetch-pdf')
    .description('Download a PDF from a known URL with browser-like headers')
    .argument('<url>', 'PDF URL')
    .argument('<output>', 'Output file path')
    .option('--timeout-ms <number>', 'Request timeout in milliseconds', parseTimeoutMs)
    .option('--verbose', 'Enable verbose logging')
    .action(async (url: string, output: string, options: FetchPdfCommandOptions) => {
      getLogger({ verbose: options.verbose ?? false });
      print(`Downloading PDF from: ${url}`);
      print(`Saving to: ${output}`);

      const result = await download(url, output, { timeoutMs: options.timeoutMs });
      print(`PDF downloaded successfully: ${result.sizeBytes} bytes`);
    });

  return program;
}
