/**
 * Passive network interceptor
 * Registered once per browser context, before the driver triggers anything,
 * so documents opened in popups or streamed from opaque URLs are captured
 * without the driver knowing how the site delivered them.
 */

import type { BrowserContext, Page, Response, Route } from 'playwright';
import { describeError, getLogger, type EpisodeLog, type ScopedLogger } from '../utils/logger.js';
import { isPdfLikeResponse, isPdfLikeUrl } from './classifier.js';
import type { EpisodeHistory } from './history.js';
import type { CaptureSink } from './sink.js';

const ROUTE_PATTERN = '**/*';

export interface InterceptorOptions {
  /** Receives the PDF-like URLs seen on the wire */
  history?: EpisodeHistory;
  log?: EpisodeLog;
  /** Attach a content-type sniffer to every page (default true) */
  sniffResponses?: boolean;
}

export interface InterceptorHandle {
  /** Every page the context has opened, in order; appended synchronously */
  readonly pages: Page[];
  detach(): Promise<void>;
}

const attached = new WeakMap<BrowserContext, InterceptorHandle>();

export async function attachInterceptor(
  context: BrowserContext,
  destinationPath: string,
  sink: CaptureSink,
  options: InterceptorOptions = {}
): Promise<InterceptorHandle> {
  const existing = attached.get(context);
  if (existing) {
    return existing;
  }

  const routeLog = getLogger().scope('route', options.log);
  const sniffLog = getLogger().scope('sniffer', options.log);
  const sniff = options.sniffResponses ?? true;
  const pages: Page[] = [];

  const onRoute = (route: Route): Promise<void> =>
    handleRoute(route, destinationPath, sink, routeLog, options.history);

  const onResponse = async (response: Response): Promise<void> => {
    if (sink.saved || !response.ok()) {
      return;
    }
    const url = response.url();
    if (!isPdfLikeResponse(response.headers()['content-type'], url)) {
      return;
    }
    options.history?.record(url, 'network');
    try {
      const body = await response.body();
      if (body.length > 0) {
        sniffLog.info(`PDF response detected: ${url}`);
        await sink.trySave(body, destinationPath, 'sniffer');
      }
    } catch (error) {
      sniffLog.debug(`Could not read body of ${url}: ${describeError(error)}`);
    }
  };

  const trackPage = (page: Page): void => {
    if (pages.includes(page)) {
      return;
    }
    pages.push(page);
    if (sniff) {
      page.on('response', onResponse);
    }
  };

  const handle: InterceptorHandle = {
    pages,
    async detach(): Promise<void> {
      attached.delete(context);
      context.off('page', trackPage);
      for (const page of pages) {
        page.off('response', onResponse);
      }
      await context.unroute(ROUTE_PATTERN, onRoute);
      routeLog.debug('PDF route capture detached');
    },
  };
  // Registered before the first await so a concurrent attach sees it
  attached.set(context, handle);

  for (const page of context.pages()) {
    trackPage(page);
  }
  context.on('page', trackPage);

  await context.route(ROUTE_PATTERN, onRoute);
  routeLog.info('PDF route capture attached at context level');
  return handle;
}

async function handleRoute(
  route: Route,
  destinationPath: string,
  sink: CaptureSink,
  log: ScopedLogger,
  history?: EpisodeHistory
): Promise<void> {
  const url = route.request().url();
  if (sink.saved || !isPdfLikeUrl(url)) {
    await passThrough(route, log);
    return;
  }

  history?.record(url, 'network');
  log.info(`Intercepting PDF request: ${url}`);

  try {
    const response = await route.fetch();
    const body = await response.body();
    if (response.ok() && body.length > 0) {
      await sink.trySave(body, destinationPath, 'route');
    } else {
      log.debug(`Not persisting ${url}: status ${response.status()}, ${body.length} bytes`);
    }
    await route.fulfill({ status: response.status(), headers: response.headers(), body });
  } catch (error) {
    log.warn(`Error capturing ${url}: ${describeError(error)}`);
    await passThrough(route, log);
  }
}

async function passThrough(route: Route, log: ScopedLogger): Promise<void> {
  try {
    await route.continue();
  } catch (error) {
    log.debug(`Could not continue ${route.request().url()}: ${describeError(error)}`);
  }
}
