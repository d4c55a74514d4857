import puppeteer, { Browser } from "puppeteer-core";
import type { AppConfig } from "./config";
import { createLogger } from "./logger";

const log = createLogger("page");

const TABLE_SELECTOR = "table";
const SETTLE_DELAY_MS = 2000;

export interface PageSource {
  fetchPage(): Promise<string>;
  close(): Promise<void>;
}

/**
 * Loads the schedule page in headless Chrome; the grid is painted by
 * client-side scripts, so a plain HTTP fetch returns an empty table.
 */
export class PageClient implements PageSource {
  private browser: Browser | null = null;

  constructor(
    private readonly config: Pick<
      AppConfig,
      "scheduleUrl" | "userAgent" | "requestTimeoutMs" | "chromeExecutablePath"
    >
  ) {}

  async fetchPage(): Promise<string> {
    const browser = await this.launch();
    const page = await browser.newPage();

    try {
      await page.setUserAgent(this.config.userAgent);
      log.info(`Opening ${this.config.scheduleUrl}`);
      await page.goto(this.config.scheduleUrl, {
        waitUntil: "domcontentloaded",
        timeout: this.config.requestTimeoutMs,
      });
      await page.waitForSelector(TABLE_SELECTOR, {
        timeout: this.config.requestTimeoutMs / 2,
      });

      await new Promise((resolve) => setTimeout(resolve, SETTLE_DELAY_MS));

      const html = await page.content();
      log.info(`HTML loaded (${html.length} chars)`);
      return html;
    } finally {
      await page.close();
    }
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
    }
  }

  private async launch(): Promise<Browser> {
    if (this.browser) {
      return this.browser;
    }
    if (!this.config.chromeExecutablePath) {
      throw new Error("CHROME_EXECUTABLE_PATH is required to fetch the schedule page");
    }

    this.browser = await puppeteer.launch({
      executablePath: this.config.chromeExecutablePath,
      headless: true,
      args: [
        "--no-sandbox",
        "--disable-setuid-sandbox",
        "--disable-dev-shm-usage",
        "--disable-blink-features=AutomationControlled",
      ],
    });
    return this.browser;
  }
}
