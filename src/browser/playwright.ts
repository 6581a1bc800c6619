/**
 * browser/playwright.ts — Chromium-backed PageSurface
 *
 * playwright-core never downloads a browser; point BROWSER_CHANNEL or
 * BROWSER_EXECUTABLE at an installed Chrome/Chromium.
 *
 * Desktop context (1920×1080) carries the map. Detail pages open in a
 * separate mobile context when USE_MOBILE_DETAIL is on.
 */
import {
  chromium,
  devices,
  type Browser,
  type BrowserContext,
  type Page,
  type Response,
} from 'playwright-core';
import { childLogger } from '../shared/logger.ts';
import { errorMessage, failure, ok, type Outcome } from '../shared/outcome.ts';
import { NOT_FOUND, type BrowserHost, type LocateOutcome, type PageSurface, type ResponseListener } from './surface.ts';

const DESKTOP_UA = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';
const MOBILE_DEVICE = 'iPhone 14 Pro Max';
const BLOCKED_RESOURCES = new Set(['image', 'media', 'font']);

const HIDE_WEBDRIVER = "Object.defineProperty(navigator, 'webdriver', { get: () => undefined });";
// Detail pages open links in place instead of spawning popups
const SAME_TAB_OPEN = 'window.open = (u) => { location.href = u; };';

const NAV_TIMEOUT_MS = 30_000;
const CLICK_TIMEOUT_MS = 3_000;
const TEXT_TIMEOUT_MS = 5_000;

export interface PlaywrightHostOptions {
  headless: boolean;
  channel?: string;
  executablePath?: string;
  useMobileDetail: boolean;
  blockHeavyResources: boolean;
}

const log = childLogger({ module: 'browser' });

class PlaywrightPage implements PageSurface {
  constructor(private readonly page: Page) {}

  async goto(url: string): Promise<Outcome<void>> {
    try {
      await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: NAV_TIMEOUT_MS });
      return ok(undefined);
    } catch (err) {
      return failure('navigation_failed', errorMessage(err));
    }
  }

  url(): string {
    return this.page.url();
  }

  async mouseMove(x: number, y: number, steps?: number): Promise<void> {
    await this.page.mouse.move(x, y, steps ? { steps } : undefined);
  }

  async mouseDown(): Promise<void> {
    await this.page.mouse.down();
  }

  async mouseUp(): Promise<void> {
    await this.page.mouse.up();
  }

  async wheel(deltaX: number, deltaY: number): Promise<void> {
    await this.page.mouse.wheel(deltaX, deltaY);
  }

  async clickByLabel(labels: readonly string[]): Promise<LocateOutcome> {
    for (const label of labels) {
      const target = this.page.getByText(label).first();
      try {
        if (await target.count() === 0) continue;
        await target.click({ timeout: CLICK_TIMEOUT_MS });
        return { found: true, label };
      } catch (err) {
        // detached or covered between count() and click(); next label
        log.debug({ label, err: errorMessage(err) }, 'Label click failed');
      }
    }
    return NOT_FOUND;
  }

  async bodyText(): Promise<string | null> {
    try {
      return await this.page.innerText('body', { timeout: TEXT_TIMEOUT_MS });
    } catch (err) {
      log.debug({ url: this.page.url(), err: errorMessage(err) }, 'Body text unreadable');
      return null;
    }
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<boolean> {
    return this.page.waitForSelector(selector, { timeout: timeoutMs }).then(() => true, () => false);
  }

  async waitForResponse(match: (url: string) => boolean, timeoutMs: number): Promise<boolean> {
    return this.page.waitForResponse((r) => match(r.url()), { timeout: timeoutMs }).then(() => true, () => false);
  }

  onResponse(listener: ResponseListener): () => void {
    const handler = (response: Response) => listener({ url: response.url(), json: () => response.json() });
    this.page.on('response', handler);
    return () => {
      this.page.off('response', handler);
    };
  }
}

async function blockHeavyResources(ctx: BrowserContext): Promise<void> {
  await ctx.route('**/*', (route) =>
    BLOCKED_RESOURCES.has(route.request().resourceType()) ? route.abort() : route.continue());
}

export class PlaywrightHost implements BrowserHost {
  private constructor(
    private readonly browser: Browser,
    private readonly desktop: BrowserContext,
    private readonly detailContext: BrowserContext,
    private readonly map: PlaywrightPage,
  ) {}

  static async launch(opts: PlaywrightHostOptions): Promise<PlaywrightHost> {
    log.info({ headless: opts.headless, channel: opts.channel }, 'Launching browser');
    const browser = await chromium.launch({
      headless: opts.headless,
      channel: opts.channel,
      executablePath: opts.executablePath,
    });
    try {
      const desktop = await browser.newContext({
        viewport: { width: 1920, height: 1080 },
        userAgent: DESKTOP_UA,
      });
      if (opts.blockHeavyResources) await blockHeavyResources(desktop);

      let detailContext = desktop;
      if (opts.useMobileDetail) {
        detailContext = await browser.newContext({
          ...devices[MOBILE_DEVICE],
          locale: 'ko-KR',
          extraHTTPHeaders: {
            referer: 'https://m.land.naver.com/',
            'accept-language': 'ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7',
          },
        });
        if (opts.blockHeavyResources) await blockHeavyResources(detailContext);
      }

      const page = await desktop.newPage();
      await page.addInitScript(HIDE_WEBDRIVER);
      return new PlaywrightHost(browser, desktop, detailContext, new PlaywrightPage(page));
    } catch (err) {
      await browser.close();
      throw err;
    }
  }

  mapPage(): PageSurface {
    return this.map;
  }

  async openDetailPages(count: number): Promise<PageSurface[]> {
    const pages: PageSurface[] = [];
    for (let i = 0; i < Math.max(1, count); i++) {
      const page = await this.detailContext.newPage();
      await page.addInitScript(`${HIDE_WEBDRIVER}\n${SAME_TAB_OPEN}`);
      pages.push(new PlaywrightPage(page));
    }
    return pages;
  }

  async close(): Promise<void> {
    if (this.detailContext !== this.desktop) await this.detailContext.close();
    await this.desktop.close();
    await this.browser.close();
  }
}
