/**
 * HTTP API over the lookup workflow
 *
 * GET  /                        service description
 * GET  /health                  liveness + artifacts directory state
 * POST /check-clean-hands       run one lookup
 * GET  /download-pdf/:filename  a captured PDF from the artifacts directory
 * GET  /list-artifacts          captured PDFs
 */

import { createReadStream } from 'fs';
import { readdir, stat } from 'fs/promises';
import http from 'http';
import { join } from 'path';
import { pipeline } from 'stream/promises';
import { runWorkflow } from '../clean-hands/workflow.js';
import type { AppConfig } from '../config/types.js';
import { describeError, getLogger } from '../utils/logger.js';
import { isPdfFilename } from '../utils/paths.js';
import { checkRequestSchema, processCheckRequest, type WorkflowRunner } from './check.js';

export const SERVICE_NAME = 'DC Clean Hands Certificate Checker';
export const SERVICE_VERSION = '0.1.0';

/** Request bodies are a few short fields */
const MAX_BODY_BYTES = 64 * 1024;

export interface ServerDependencies {
  runWorkflow?: WorkflowRunner;
}

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly extra: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(payload),
  });
  res.end(payload);
}

async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new HttpError(413, 'Request body too large');
    }
    chunks.push(buffer);
  }

  try {
    return JSON.parse(Buffer.concat(chunks).toString('utf-8'));
  } catch {
    throw new HttpError(400, 'Malformed JSON body');
  }
}

async function directoryExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function listPdfFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir);
    return entries.filter((name) => name.toLowerCase().endsWith('.pdf')).sort();
  } catch (error) {
    getLogger().debug(`Could not list ${dir}: ${describeError(error)}`);
    return [];
  }
}

function describeService(config: AppConfig) {
  return {
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    endpoints: {
      health: '/health',
      checkCertificate: '/check-clean-hands',
      downloadPdf: '/download-pdf/{filename}',
      listArtifacts: '/list-artifacts',
    },
    baseUrl: config.baseUrl,
    usage: {
      method: 'POST',
      endpoint: '/check-clean-hands',
      body: { notice: 'L0000000000', last4: '0000', email: 'user@example.com' },
    },
  };
}

async function sendPdf(res: http.ServerResponse, config: AppConfig, rawName: string): Promise<void> {
  let filename: string;
  try {
    filename = decodeURIComponent(rawName);
  } catch {
    throw new HttpError(400, 'Invalid filename');
  }
  if (!isPdfFilename(filename)) {
    throw new HttpError(400, 'Invalid filename');
  }

  const path = join(config.artifactsDir, filename);
  let size: number;
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      throw new HttpError(404, 'PDF file not found');
    }
    size = info.size;
  } catch (error) {
    if (error instanceof HttpError) {
      throw error;
    }
    throw new HttpError(404, 'PDF file not found');
  }

  res.writeHead(200, {
    'Content-Type': 'application/pdf',
    'Content-Length': size,
    'Content-Disposition': `attachment; filename="${filename}"`,
  });
  await pipeline(createReadStream(path), res);
}

/**
 * Build the request listener; the workflow runner is injectable for tests
 */
export function createRequestHandler(config: AppConfig, deps: ServerDependencies = {}): http.RequestListener {
  const logger = getLogger();
  const runner = deps.runWorkflow ?? runWorkflow;

  const route = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const { pathname } = new URL(req.url ?? '/', 'http://localhost');
    const method = req.method ?? 'GET';

    if (method === 'GET' && pathname === '/') {
      sendJson(res, 200, describeService(config));
      return;
    }

    if (method === 'GET' && pathname === '/health') {
      sendJson(res, 200, {
        status: 'healthy',
        artifactsDir: config.artifactsDir,
        artifactsExists: await directoryExists(config.artifactsDir),
      });
      return;
    }

    if (method === 'POST' && pathname === '/check-clean-hands') {
      const parsed = checkRequestSchema.safeParse(await readJsonBody(req));
      if (!parsed.success) {
        throw new HttpError(400, 'Invalid request', {
          issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
        });
      }
      logger.info(`Check request received for notice ${parsed.data.notice}`);
      sendJson(res, 200, await processCheckRequest(parsed.data, config, runner));
      return;
    }

    const download = /^\/download-pdf\/([^/]+)$/.exec(pathname);
    if (method === 'GET' && download) {
      await sendPdf(res, config, download[1]);
      return;
    }

    if (method === 'GET' && pathname === '/list-artifacts') {
      const pdfFiles = await listPdfFiles(config.artifactsDir);
      sendJson(res, 200, { artifactsDir: config.artifactsDir, pdfFiles, totalFiles: pdfFiles.length });
      return;
    }

    throw new HttpError(404, 'Not found');
  };

  return (req, res) => {
    route(req, res).catch((error: unknown) => {
      if (error instanceof HttpError) {
        sendJson(res, error.status, { error: error.message, ...error.extra });
        return;
      }
      logger.error(`${req.method ?? 'GET'} ${req.url ?? '/'} failed: ${describeError(error)}`);
      if (res.headersSent) {
        res.destroy();
        return;
      }
      sendJson(res, 500, { error: 'Internal server error' });
    });
  };
}

export function createCleanHandsServer(config: AppConfig, deps: ServerDependencies = {}): http.Server {
  return http.createServer(createRequestHandler(config, deps));
}

/**
 * Listen on config.port; resolves once the socket is bound
 */
export function startServer(config: AppConfig, deps: ServerDependencies = {}): Promise<http.Server> {
  const server = createCleanHandsServer(config, deps);
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, () => {
      server.off('error', reject);
      getLogger().info(`Listening on http://localhost:${config.port} (artifacts: ${config.artifactsDir})`);
      resolve(server);
    });
  });
}
