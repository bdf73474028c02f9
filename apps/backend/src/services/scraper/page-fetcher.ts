import axios, { type AxiosInstance } from 'axios';
import puppeteerCore, { type Browser, type HTTPRequest, type Page } from 'puppeteer-core';
import { addExtra } from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import { sleep } from '../../lib/concurrency';
import { ConfigError, errorMessage } from '../../lib/errors';
import { readNumberEnv } from '../../lib/load-env';
import { getPageFetchMode } from '../../lib/runtime-preflight';

const puppeteer = addExtra(puppeteerCore);
puppeteer.use(StealthPlugin());

const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36';

const BLOCKED_RESOURCE_TYPES = new Set(['image', 'media', 'font']);
const POST_LINK_WAIT_MS = 3000;

/**
 * Fetches a page's rendered HTML.
 *
 * Login walls and throttle pages come back as ordinary HTML; only navigation/network
 * failures reject (with `FetchError`). Callers check content with `looksLikeLoginWall`.
 */
export interface PageFetcher {
  fetchHtml(url: string): Promise<string>;
  close?(): Promise<void>;
}

export class FetchError extends Error {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super(`Fetch failed for ${url}: ${message}`, options);
    this.name = 'FetchError';
    this.url = url;
  }
}

export interface BrowserPageFetcherOptions {
  executablePath: string;
  timeoutMs?: number;
  waitMs?: number;
}

/**
 * Headless Chromium fetcher. One browser per process, launched on first use and shared by
 * every concurrent fetch; each fetch gets its own tab.
 */
export class BrowserPageFetcher implements PageFetcher {
  private browserPromise: Promise<Browser> | null = null;
  private readonly executablePath: string;
  private readonly timeoutMs: number;
  private readonly waitMs: number;

  constructor(options: BrowserPageFetcherOptions) {
    this.executablePath = options.executablePath;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.waitMs = options.waitMs ?? 1_200;
  }

  private ensureBrowser(): Promise<Browser> {
    // The promise itself is the lock: concurrent callers await the same launch.
    if (this.browserPromise) return this.browserPromise;

    console.log('[PageFetch] Launching shared headless browser');
    const launching: Promise<Browser> = puppeteer
      .launch({
        headless: true,
        executablePath: this.executablePath,
        args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage'],
      })
      .catch((error: unknown) => {
        this.browserPromise = null;
        throw error;
      });
    this.browserPromise = launching;
    return launching;
  }

  async fetchHtml(url: string): Promise<string> {
    let page: Page | null = null;
    try {
      const browser = await this.ensureBrowser();
      page = await browser.newPage();
      await page.setUserAgent(USER_AGENT);
      await page.setRequestInterception(true);
      page.on('request', (request: HTTPRequest) => {
        if (request.isInterceptResolutionHandled()) return;
        const action = BLOCKED_RESOURCE_TYPES.has(request.resourceType()) ? request.abort() : request.continue();
        action.catch((error: unknown) => {
          console.warn(`[PageFetch] request interception failed on ${url}: ${errorMessage(error)}`);
        });
      });

      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.timeoutMs });
      await sleep(this.waitMs);

      // Listing pages render post links late; profile pages without posts simply time out here.
      const sawPostLinks = await page
        .waitForFunction("document.body !== null && document.body.innerHTML.includes('/p/')", {
          timeout: POST_LINK_WAIT_MS,
        })
        .then(
          () => true,
          () => false
        );
      if (!sawPostLinks) {
        console.debug(`[PageFetch] no post links rendered on ${url}`);
      }

      return await page.content();
    } catch (error) {
      throw new FetchError(url, errorMessage(error), { cause: error });
    } finally {
      if (page) {
        await page.close().catch((error: unknown) => {
          console.warn(`[PageFetch] failed to close tab for ${url}: ${errorMessage(error)}`);
        });
      }
    }
  }

  async close(): Promise<void> {
    if (!this.browserPromise) return;
    const pending = this.browserPromise;
    this.browserPromise = null;
    const browser = await pending;
    await browser.close();
  }
}

export interface HttpPageFetcherOptions {
  client?: AxiosInstance;
  timeoutMs?: number;
  sessionCookie?: string;
}

/**
 * Plain HTTP fetcher (no rendering). Cheaper than the browser and good enough for pages
 * that embed their data server-side; 4xx bodies are returned as-is so throttle pages
 * reach the login-wall check.
 */
export class HttpPageFetcher implements PageFetcher {
  private readonly client: AxiosInstance;

  constructor(options: HttpPageFetcherOptions = {}) {
    this.client =
      options.client ??
      axios.create({
        timeout: options.timeoutMs ?? 30_000,
        maxRedirects: 5,
        headers: {
          'User-Agent': USER_AGENT,
          Accept: 'text/html,application/xhtml+xml',
          'Accept-Language': 'en-US,en;q=0.9',
          ...(options.sessionCookie ? { Cookie: options.sessionCookie } : {}),
        },
      });
  }

  async fetchHtml(url: string): Promise<string> {
    try {
      const res = await this.client.get<string>(url, {
        responseType: 'text',
        validateStatus: (status) => status < 500,
      });
      return String(res.data ?? '');
    } catch (error) {
      const detail = axios.isAxiosError(error)
        ? `${error.code ?? `HTTP ${error.response?.status ?? 'error'}`}: ${error.message}`
        : errorMessage(error);
      throw new FetchError(url, detail, { cause: error });
    }
  }
}

export function createPageFetcherFromEnv(): PageFetcher {
  const mode = getPageFetchMode();
  const timeoutMs = readNumberEnv('PAGE_FETCH_TIMEOUT_MS', 60_000, 1_000);

  if (mode === 'http') {
    return new HttpPageFetcher({
      timeoutMs,
      sessionCookie: String(process.env.INSTAGRAM_SESSION_COOKIE || '').trim() || undefined,
    });
  }

  const executablePath = String(process.env.CHROME_EXECUTABLE_PATH || '').trim();
  if (!executablePath) {
    throw new ConfigError('[PageFetch] CHROME_EXECUTABLE_PATH is required when PAGE_FETCH_MODE=browser');
  }
  return new BrowserPageFetcher({
    executablePath,
    timeoutMs,
    waitMs: readNumberEnv('PAGE_FETCH_WAIT_MS', 1_200),
  });
}
