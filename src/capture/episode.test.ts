import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { jest } from '@jest/globals';
import { CaptureEpisode } from './episode';
import { resetLogger } from '../utils/logger';
import {
  FakeDownload,
  FakeLocator,
  asContext,
  asLocator,
  asPage,
  createFakeBrowser,
} from '../testing/fake-browser';

const timeouts = { navigationMs: 20, longMs: 20, shortMs: 20 };

describe('CaptureEpisode', () => {
  let dir: string;

  beforeEach(async () => {
    resetLogger();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    dir = await mkdtemp(join(tmpdir(), 'episode-test-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('should report the winning strategy and its log lines', async () => {
    const { context, page } = createFakeBrowser();
    const dest = join(dir, 'doc.pdf');
    const episode = new CaptureEpisode(asContext(context), dest, { timeouts });
    await episode.start();

    const trigger = new FakeLocator(() => {
      page.emit('download', new FakeDownload('%PDF-1.6 native'));
    });
    await episode.runActive(asPage(page), asLocator(trigger));
    const outcome = await episode.outcome();
    await episode.finish();

    expect(outcome.saved).toBe(true);
    expect(outcome.path).toBe(dest);
    expect(outcome.source).toBe('native-download');
    expect(outcome.attempts).toEqual(['native-download']);
    expect(outcome.log).toContain(`INFO [sink] Saved PDF via native-download: ${dest} (15 bytes)`);
    expect((await readFile(dest)).toString()).toBe('%PDF-1.6 native');
    expect(context.routeCount).toBe(0);
  });

  it('should track popups opened after start', async () => {
    const { context, page } = createFakeBrowser();
    const episode = new CaptureEpisode(asContext(context), join(dir, 'doc.pdf'), { timeouts });

    expect(episode.pages).toEqual([]);
    await episode.start();
    const popup = page.openPopup('https://s.test/viewer');

    expect(episode.pages).toEqual([asPage(page), asPage(popup)]);
    await episode.finish();
  });

  it('should report nothing saved when recovery finds no document', async () => {
    const { context, page } = createFakeBrowser();
    page.currentUrl = 'https://mytax.dc.gov/_/';
    const episode = new CaptureEpisode(asContext(context), join(dir, 'doc.pdf'), {
      timeouts,
      recoverySettleMs: 0,
    });
    await episode.start();
    episode.history.record(page.url());

    await expect(episode.recover(asPage(page))).resolves.toBeNull();
    const outcome = await episode.outcome();
    await episode.finish();

    expect(outcome).toEqual({
      saved: false,
      path: null,
      source: null,
      attempts: [],
      log: expect.arrayContaining(['INFO [recover] No PDF-like URL in history; nothing to recover']),
    });
  });
});
