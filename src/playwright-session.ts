import { chromium, type Browser, type BrowserContext, type Frame, type Locator, type Page } from "playwright";
import type {
  AutomationContext,
  AutomationPage,
  AutomationSession,
  AutomationSessionFactory,
  ElementState,
  TimeoutOptions,
  UiElement
} from "./automation.js";

export interface PlaywrightSessionOptions {
  headless: boolean;
  userAgent: string;
  viewportWidth?: number;
  viewportHeight?: number;
  locale?: string;
}

const LAUNCH_ARGS = [
  "--no-sandbox",
  "--disable-blink-features=AutomationControlled",
  "--disable-dev-shm-usage",
  "--disable-gpu"
];

class PlaywrightElement implements UiElement {
  constructor(private readonly locatorHandle: Locator) {}

  count(): Promise<number> {
    return this.locatorHandle.count();
  }

  first(): UiElement {
    return new PlaywrightElement(this.locatorHandle.first());
  }

  last(): UiElement {
    return new PlaywrightElement(this.locatorHandle.last());
  }

  nth(index: number): UiElement {
    return new PlaywrightElement(this.locatorHandle.nth(index));
  }

  locator(selector: string): UiElement {
    return new PlaywrightElement(this.locatorHandle.locator(selector));
  }

  async waitFor(options: { state?: ElementState; timeout?: number }): Promise<void> {
    await this.locatorHandle.waitFor(options);
  }

  isVisible(options?: TimeoutOptions): Promise<boolean> {
    return this.locatorHandle.isVisible(options);
  }

  click(options?: TimeoutOptions): Promise<void> {
    return this.locatorHandle.click(options);
  }

  fill(value: string, options?: TimeoutOptions): Promise<void> {
    return this.locatorHandle.fill(value, options);
  }

  press(key: string, options?: TimeoutOptions): Promise<void> {
    return this.locatorHandle.press(key, options);
  }

  getAttribute(name: string, options?: TimeoutOptions): Promise<string | null> {
    return this.locatorHandle.getAttribute(name, options);
  }

  textContent(options?: TimeoutOptions): Promise<string | null> {
    return this.locatorHandle.textContent(options);
  }

  setInputFiles(paths: string[], options?: TimeoutOptions): Promise<void> {
    return this.locatorHandle.setInputFiles(paths, options);
  }

  async selectOption(value: string, options?: TimeoutOptions): Promise<void> {
    await this.locatorHandle.selectOption(value, options);
  }

  dispatchClick(): Promise<void> {
    return this.locatorHandle.dispatchEvent("click");
  }
}

class PlaywrightContext implements AutomationContext {
  constructor(
    readonly label: string,
    protected readonly target: Page | Frame
  ) {}

  locator(selector: string): UiElement {
    return new PlaywrightElement(this.target.locator(selector));
  }

  getByText(text: string, options?: { exact?: boolean }): UiElement {
    return new PlaywrightElement(this.target.getByText(text, options));
  }

  getByLabel(text: string, options?: { exact?: boolean }): UiElement {
    return new PlaywrightElement(this.target.getByLabel(text, options));
  }
}

class PlaywrightPage extends PlaywrightContext implements AutomationPage {
  constructor(private readonly page: Page) {
    super("page", page);
  }

  async goto(url: string, options?: TimeoutOptions): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: options?.timeout });
  }

  frames(): AutomationContext[] {
    return this.page
      .frames()
      .filter((frame) => frame !== this.page.mainFrame())
      .map((frame, index) => new PlaywrightContext(frame.name() || `frame-${index + 1}`, frame));
  }

  async screenshot(path: string): Promise<void> {
    await this.page.screenshot({ path, fullPage: true });
  }

  async waitForSelector(selector: string, options?: TimeoutOptions): Promise<void> {
    await this.page.waitForSelector(selector, { timeout: options?.timeout });
  }

  async chooseFiles(trigger: () => Promise<void>, paths: string[], options?: TimeoutOptions): Promise<void> {
    const [chooser] = await Promise.all([
      this.page.waitForEvent("filechooser", { timeout: options?.timeout }),
      trigger()
    ]);
    await chooser.setFiles(paths);
  }
}

/** One isolated chromium browser per job. */
export class PlaywrightSession implements AutomationSession {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;

  constructor(private readonly options: PlaywrightSessionOptions) {}

  async open(): Promise<AutomationPage> {
    this.browser = await chromium.launch({
      headless: this.options.headless,
      args: LAUNCH_ARGS
    });
    this.context = await this.browser.newContext({
      userAgent: this.options.userAgent,
      viewport: {
        width: this.options.viewportWidth ?? 1366,
        height: this.options.viewportHeight ?? 900
      },
      locale: this.options.locale ?? "en-US"
    });
    const page = await this.context.newPage();
    return new PlaywrightPage(page);
  }

  async close(): Promise<void> {
    const { context, browser } = this;
    this.context = null;
    this.browser = null;
    await closeInOrder(context, browser);
  }
}

interface Closable {
  close(): Promise<void>;
}

/** Closes the context, then the browser, even when the context refuses to close. */
export async function closeInOrder(context: Closable | null, browser: Closable | null): Promise<void> {
  try {
    await context?.close();
  } finally {
    await browser?.close();
  }
}

export function playwrightSessionFactory(options: PlaywrightSessionOptions): AutomationSessionFactory {
  return () => new PlaywrightSession(options);
}
