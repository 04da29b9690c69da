import { chromium, type Browser, type BrowserContext, type Page } from "playwright";
import { AuthenticationError, TransientError } from "./errors.js";
import type { Session } from "./session.js";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

const VIEWPORT = { width: 1920, height: 1080 };

const LOGIN_URL_MARKERS = ["/login", "/authorize", "accounts.spotify.com"];

export function isLoginRedirect(url: string): boolean {
  return LOGIN_URL_MARKERS.some((marker) => url.includes(marker));
}

/** One open page, reduced to what materialization needs. */
export interface PageHandle {
  readonly url: string;
  countItems(selector: string): Promise<number>;
  loadMore(): Promise<void>;
  settle(timeoutMs: number): Promise<void>;
  /** Clicks a toggle that reveals collapsed content, when one is on the page. */
  expand(selector: string): Promise<void>;
  content(): Promise<string>;
  close(): Promise<void>;
}

export interface BrowsingContext {
  open(url: string, options: { timeoutMs: number }): Promise<PageHandle>;
  close(): Promise<void>;
}

export type BrowsingContextFactory = (session: Session) => Promise<BrowsingContext>;

export function browserLaunchOptions(headless: boolean) {
  return {
    headless,
    args: ["--disable-blink-features=AutomationControlled", "--disable-dev-shm-usage", "--no-sandbox"]
  };
}

export function contextOptions() {
  return { viewport: VIEWPORT, userAgent: DEFAULT_USER_AGENT };
}

export async function waitForSettled(page: Page, timeoutMs: number): Promise<void> {
  try {
    await page.waitForLoadState("networkidle", { timeout: timeoutMs });
  } catch (err) {
    // long-polling pages never go idle; a settle timeout only means "stop waiting"
    if (!(err instanceof Error) || err.name !== "TimeoutError") throw err;
  }
}

class PlaywrightPageHandle implements PageHandle {
  constructor(private readonly page: Page) {}

  get url() {
    return this.page.url();
  }

  countItems(selector: string) {
    return this.page.locator(selector).count();
  }

  async loadMore() {
    await this.page.evaluate("window.scrollTo(0, document.body.scrollHeight)");
  }

  settle(timeoutMs: number) {
    return waitForSettled(this.page, timeoutMs);
  }

  async expand(selector: string) {
    const toggle = this.page.locator(selector).first();
    if ((await toggle.count()) === 0) return;
    await toggle.click();
    await waitForSettled(this.page, 2000);
  }

  content() {
    return this.page.content();
  }

  close() {
    return this.page.close();
  }
}

export class PlaywrightBrowsingContext implements BrowsingContext {
  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext
  ) {}

  static async launch(session: Session, { headless }: { headless: boolean }) {
    const browser = await chromium.launch(browserLaunchOptions(headless));
    try {
      const context = await browser.newContext({ ...contextOptions(), storageState: session.credentials });
      return new PlaywrightBrowsingContext(browser, context);
    } catch (err) {
      await browser.close();
      throw err;
    }
  }

  async open(url: string, { timeoutMs }: { timeoutMs: number }): Promise<PageHandle> {
    const page = await this.context.newPage();
    try {
      const response = await page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });
      const status = response?.status() ?? 200;
      if (status === 429 || status >= 500) {
        throw new TransientError(`GET ${url} failed: ${status}`);
      }
      if (isLoginRedirect(page.url())) {
        throw new AuthenticationError(`Session expired: ${url} redirected to ${page.url()}`);
      }
      return new PlaywrightPageHandle(page);
    } catch (err) {
      await page.close();
      throw err;
    }
  }

  async close() {
    await this.context.close();
    await this.browser.close();
  }
}

export function playwrightContextFactory({ headless }: { headless: boolean }): BrowsingContextFactory {
  return (session) => PlaywrightBrowsingContext.launch(session, { headless });
}
