/**
 * At-most-once persistence for one document-acquisition episode
 *
 * Every capture channel (route interceptor, response sniffer, active
 * strategies, harvester) funnels bytes through one shared sink. The claim is
 * taken synchronously, before the first await, so two channels interleaving
 * on the event loop can never both write. Files are written to <dest>.tmp and
 * renamed into place.
 */

import { mkdir, rename, rm, stat, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { getLogger, describeError, type EpisodeLog } from '../utils/logger.js';
import { isPdfBytes } from './classifier.js';

/** Produces the file at the given temporary path (e.g. Download.saveAs) */
export type SinkWriter = (tempPath: string) => Promise<void>;

type SinkState = 'idle' | 'writing' | 'saved';

export interface CaptureSinkOptions {
  /** Episode log receiving the sink's lines */
  log?: EpisodeLog;
}

export class CaptureSink {
  private state: SinkState = 'idle';
  private savedPath: string | null = null;
  private winner: string | null = null;
  private pending: Promise<boolean> = Promise.resolve(false);
  private readonly logger;

  constructor(options: CaptureSinkOptions = {}) {
    this.logger = getLogger().scope('sink', options.log);
  }

  /** True once a file has been written and renamed into place */
  get saved(): boolean {
    return this.state === 'saved';
  }

  /** Destination of the winning write; null until saved */
  get path(): string | null {
    return this.state === 'saved' ? this.savedPath : null;
  }

  /** True while a write is in progress or after it succeeded */
  get claimed(): boolean {
    return this.state !== 'idle';
  }

  /** Name of the capture channel that won, if any */
  get source(): string | null {
    return this.state === 'saved' ? this.winner : null;
  }

  /**
   * Persist bytes unless another channel already saved a file. A call made
   * while a write is in progress waits for it and takes over if it fails.
   * Resolves true only for the call that performed the write.
   */
  trySave(bytes: Uint8Array, destinationPath: string, source = 'unknown'): Promise<boolean> {
    if (bytes.length === 0) {
      this.logger.debug(`${source} produced an empty body; ignoring`);
      return Promise.resolve(false);
    }
    if (!isPdfBytes(bytes)) {
      this.logger.debug(`${source} bytes do not start with a PDF signature`);
    }
    return this.trySaveWith(destinationPath, (tempPath) => writeFile(tempPath, bytes), source);
  }

  /**
   * Same contract as trySave for writers that produce the file themselves
   */
  trySaveWith(destinationPath: string, write: SinkWriter, source = 'unknown'): Promise<boolean> {
    if (this.state === 'saved') {
      this.logger.debug(`${source} lost the race; sink already saved`);
      return Promise.resolve(false);
    }
    if (this.state === 'writing') {
      return this.retryAfterPending(destinationPath, write, source);
    }
    return this.claim(destinationPath, write, source);
  }

  /**
   * Wait for an in-progress write to settle; resolves with the final saved flag
   */
  async flush(): Promise<boolean> {
    await this.pending;
    return this.saved;
  }

  private claim(destinationPath: string, write: SinkWriter, source: string): Promise<boolean> {
    // Claim before any suspension point
    this.state = 'writing';
    this.savedPath = destinationPath;
    this.winner = source;

    this.pending = this.commit(destinationPath, write, source);
    return this.pending;
  }

  /** Hold bytes until the in-progress write settles; take over if it failed */
  private async retryAfterPending(destinationPath: string, write: SinkWriter, source: string): Promise<boolean> {
    this.logger.debug(`${source} waiting on the write in progress`);
    while (this.state === 'writing') {
      await this.pending;
    }
    if (this.state === 'saved') {
      this.logger.debug(`${source} lost the race; sink already saved`);
      return false;
    }
    return this.claim(destinationPath, write, source);
  }

  private async commit(destinationPath: string, write: SinkWriter, source: string): Promise<boolean> {
    const tempPath = `${destinationPath}.tmp`;

    try {
      await mkdir(dirname(destinationPath), { recursive: true });
      await write(tempPath);

      const { size } = await stat(tempPath);
      if (size === 0) {
        throw new Error('captured file is empty');
      }

      await rename(tempPath, destinationPath);
      this.state = 'saved';
      this.logger.info(`Saved PDF via ${source}: ${destinationPath} (${size} bytes)`);
      return true;
    } catch (error) {
      this.logger.warn(`${source} could not persist ${destinationPath}: ${describeError(error)}`);
      await this.removeTemp(tempPath);
      // Release only after the temp file is gone
      this.state = 'idle';
      this.savedPath = null;
      this.winner = null;
      return false;
    }
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await rm(tempPath, { force: true });
    } catch (error) {
      this.logger.debug(`Could not remove ${tempPath}: ${describeError(error)}`);
    }
  }
}
