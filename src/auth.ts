import { chromium, type Page } from "playwright";
import { AuthenticationError } from "./errors.js";
import { browserLaunchOptions, contextOptions, isLoginRedirect, waitForSettled } from "./browser.js";
import { createSession, type Authenticator, type Session } from "./session.js";

/** A league link on the completed page means the account's data is visible. */
export const AUTHENTICATED_MARKER = 'a[href*="/l/"]';

export class PlaywrightAuthenticator implements Authenticator {
  constructor(
    private readonly options: {
      loginUrl: string;
      landingUrl: string;
      authTimeoutMs: number;
      probeTimeoutMs: number;
    }
  ) {}

  async login(): Promise<Session> {
    const { loginUrl, landingUrl, authTimeoutMs } = this.options;
    // SSO needs a visible window; credentials are entered by the user, never by us
    const browser = await chromium.launch(browserLaunchOptions(false));
    try {
      const ctx = await browser.newContext(contextOptions());
      const page = await ctx.newPage();

      console.log(`🔐 Opening ${loginUrl} …`);
      await page.goto(loginUrl, { waitUntil: "domcontentloaded" });
      console.log(`✏️  Complete the sign-in in the browser window (waiting up to ${Math.round(authTimeoutMs / 1000)}s) …`);

      const landingPath = new URL(landingUrl).pathname;
      try {
        await page.waitForURL((url) => url.pathname.startsWith(landingPath) && !isLoginRedirect(url.href), {
          timeout: authTimeoutMs
        });
        await page.locator(AUTHENTICATED_MARKER).first().waitFor({ state: "attached", timeout: 30000 });
      } catch (err) {
        throw new AuthenticationError(`Sign-in did not reach ${landingUrl} (last page: ${page.url()})`, { cause: err });
      }

      console.log(`🔑 Capturing session state …`);
      const credentials = await ctx.storageState();
      console.log("💯 Login complete.");
      return createSession(credentials);
    } finally {
      await browser.close();
    }
  }

  async isValid(session: Session): Promise<boolean> {
    const { landingUrl, probeTimeoutMs } = this.options;
    const browser = await chromium.launch(browserLaunchOptions(true));
    try {
      const ctx = await browser.newContext({ ...contextOptions(), storageState: session.credentials });
      const page = await ctx.newPage();
      await page.goto(landingUrl, { waitUntil: "domcontentloaded", timeout: probeTimeoutMs });
      await waitForSettled(page, 5000);
      return await hasAuthenticatedMarker(page);
    } catch (err) {
      console.warn("Auth validation failed:", err instanceof Error ? err.message : err);
      return false;
    } finally {
      await browser.close();
    }
  }
}

async function hasAuthenticatedMarker(page: Page): Promise<boolean> {
  if (isLoginRedirect(page.url())) return false;
  return (await page.locator(AUTHENTICATED_MARKER).count()) > 0;
}
