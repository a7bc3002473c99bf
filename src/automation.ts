export type ElementState = "attached" | "detached" | "visible" | "hidden";

export interface TimeoutOptions {
  timeout?: number;
}

/**
 * A lazily evaluated element query, shaped after Playwright's Locator so the
 * browser-backed implementation is a thin wrapper and fakes stay small.
 */
export interface UiElement {
  count(): Promise<number>;
  first(): UiElement;
  last(): UiElement;
  nth(index: number): UiElement;
  locator(selector: string): UiElement;
  waitFor(options: { state?: ElementState; timeout?: number }): Promise<void>;
  isVisible(options?: TimeoutOptions): Promise<boolean>;
  click(options?: TimeoutOptions): Promise<void>;
  fill(value: string, options?: TimeoutOptions): Promise<void>;
  press(key: string, options?: TimeoutOptions): Promise<void>;
  getAttribute(name: string, options?: TimeoutOptions): Promise<string | null>;
  textContent(options?: TimeoutOptions): Promise<string | null>;
  setInputFiles(paths: string[], options?: TimeoutOptions): Promise<void>;
  selectOption(value: string, options?: TimeoutOptions): Promise<void>;
  dispatchClick(): Promise<void>;
}

/** The page, or an embedded frame, currently hosting the conversational widget. */
export interface AutomationContext {
  readonly label: string;
  locator(selector: string): UiElement;
  getByText(text: string, options?: { exact?: boolean }): UiElement;
  getByLabel(text: string, options?: { exact?: boolean }): UiElement;
}

export interface AutomationPage extends AutomationContext {
  goto(url: string, options?: TimeoutOptions): Promise<void>;
  frames(): AutomationContext[];
  screenshot(path: string): Promise<void>;
  waitForSelector(selector: string, options?: TimeoutOptions): Promise<void>;
  /**
   * Runs `trigger` while waiting for the native file chooser it opens, then
   * hands the chooser the given files.
   */
  chooseFiles(trigger: () => Promise<void>, paths: string[], options?: TimeoutOptions): Promise<void>;
}

export interface AutomationSession {
  open(): Promise<AutomationPage>;
  close(): Promise<void>;
}

export type AutomationSessionFactory = () => AutomationSession;

export const CHAT_WIDGET_SELECTOR = "[data-testid], .chat-container, .webchat, #webchat";

/** Picks the first frame that hosts the widget, falling back to the top-level page. */
export async function findWidgetContext(page: AutomationPage): Promise<AutomationContext> {
  for (const frame of page.frames()) {
    try {
      if ((await frame.locator(CHAT_WIDGET_SELECTOR).count()) > 0) {
        return frame;
      }
    } catch {
      continue;
    }
  }
  return page;
}
