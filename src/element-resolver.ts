import type { AutomationContext, UiElement } from "./automation.js";
import { ElementNotFoundError, errorMessage, firstLine } from "./errors.js";

export type Intent =
  | {
      kind: "click";
      text: string;
    }
  | {
      kind: "fill";
      hint: string;
      value: string;
    };

export interface Strategy {
  label: string;
  attempt(context: AutomationContext, timeoutMs: number): Promise<void>;
}

export interface ActionResult {
  intent: Intent;
  strategy: string;
  attempts: string[];
}

export interface ResolveOptions {
  attemptTimeoutMs?: number;
}

export const DEFAULT_ATTEMPT_TIMEOUT_MS = 5_000;

const INPUT_LIKE_SELECTOR = "input:visible, textarea:visible";

export function describeIntent(intent: Intent): string {
  return intent.kind === "click" ? `click '${intent.text}'` : `fill '${intent.hint}'`;
}

function escapeText(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

async function actOnVisible(
  element: UiElement,
  timeoutMs: number,
  act: (element: UiElement) => Promise<void>
): Promise<void> {
  await element.waitFor({ state: "visible", timeout: timeoutMs });
  await act(element);
}

export function clickStrategies(text: string): Strategy[] {
  const quoted = escapeText(text);
  const selectors = [
    `button:has-text("${quoted}")`,
    `div[role="button"]:has-text("${quoted}")`,
    `span:has-text("${quoted}")`,
    `a:has-text("${quoted}")`,
    `text="${quoted}"`
  ];

  const strategies: Strategy[] = selectors.map((selector) => ({
    label: `css:${selector}`,
    attempt: (context, timeoutMs) =>
      actOnVisible(context.locator(selector).first(), timeoutMs, (element) => element.click({ timeout: timeoutMs }))
  }));

  strategies.push({
    label: `getByText(${text}, exact=false)`,
    attempt: (context, timeoutMs) =>
      actOnVisible(context.getByText(text, { exact: false }).first(), timeoutMs, (element) =>
        element.click({ timeout: timeoutMs })
      )
  });

  return strategies;
}

export function fillStrategies(hint: string, value: string): Strategy[] {
  const quoted = escapeText(hint);
  const selectors = [
    `input[placeholder*="${quoted}" i]`,
    `input[aria-label*="${quoted}" i]`,
    `textarea[placeholder*="${quoted}" i]`
  ];

  const strategies: Strategy[] = selectors.map((selector) => ({
    label: `css:${selector}`,
    attempt: (context, timeoutMs) =>
      actOnVisible(context.locator(selector).first(), timeoutMs, (element) =>
        element.fill(value, { timeout: timeoutMs })
      )
  }));

  strategies.push({
    label: `getByLabel(${hint})`,
    attempt: (context, timeoutMs) =>
      actOnVisible(context.getByLabel(hint, { exact: false }).first(), timeoutMs, (element) =>
        element.fill(value, { timeout: timeoutMs })
      )
  });

  strategies.push({
    label: `scan:${INPUT_LIKE_SELECTOR}`,
    attempt: async (context, timeoutMs) => {
      const needle = hint.toLowerCase();
      const inputs = context.locator(INPUT_LIKE_SELECTOR);
      const count = await inputs.count();
      for (let index = 0; index < count; index += 1) {
        const input = inputs.nth(index);
        const placeholder = (await input.getAttribute("placeholder", { timeout: timeoutMs })) ?? "";
        const ariaLabel = (await input.getAttribute("aria-label", { timeout: timeoutMs })) ?? "";
        if (placeholder.toLowerCase().includes(needle) || ariaLabel.toLowerCase().includes(needle)) {
          await input.fill(value, { timeout: timeoutMs });
          return;
        }
      }
      throw new Error(`no visible input among ${count} mentions '${hint}'`);
    }
  });

  return strategies;
}

export function strategiesFor(intent: Intent): Strategy[] {
  return intent.kind === "click" ? clickStrategies(intent.text) : fillStrategies(intent.hint, intent.value);
}

/**
 * Tries each strategy in order with its own short timeout; the first one that
 * completes wins and nothing after it is attempted.
 */
export async function runStrategies(
  context: AutomationContext,
  strategies: Strategy[],
  intentLabel: string,
  attemptTimeoutMs = DEFAULT_ATTEMPT_TIMEOUT_MS
): Promise<{ strategy: string; attempts: string[] }> {
  const attempts: string[] = [];

  for (const strategy of strategies) {
    try {
      await strategy.attempt(context, attemptTimeoutMs);
      attempts.push(`${strategy.label}: ok`);
      return { strategy: strategy.label, attempts };
    } catch (error) {
      attempts.push(`${strategy.label}: ${firstLine(errorMessage(error))}`);
    }
  }

  throw new ElementNotFoundError(intentLabel, attempts);
}

export async function resolveAndAct(
  context: AutomationContext,
  intent: Intent,
  options: ResolveOptions = {}
): Promise<ActionResult> {
  const resolved = await runStrategies(
    context,
    strategiesFor(intent),
    describeIntent(intent),
    options.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS
  );
  return { intent, ...resolved };
}

/** Tries each literal text variant through the click chain; returns the one that worked. */
export async function clickFirst(
  context: AutomationContext,
  variants: string[],
  options: ResolveOptions = {}
): Promise<string> {
  const failures: string[] = [];
  for (const text of dedupe(variants)) {
    try {
      await resolveAndAct(context, { kind: "click", text }, options);
      return text;
    } catch (error) {
      failures.push(`'${text}': ${firstLine(errorMessage(error))}`);
    }
  }
  throw new ElementNotFoundError(`any of ${dedupe(variants).map((text) => `'${text}'`).join(", ")}`, failures);
}

/**
 * Fills a field by the first hint that resolves, then by its ordinal position
 * among the visible inputs when no hint matches.
 */
export async function fillByHintOrPosition(
  context: AutomationContext,
  hints: string[],
  ordinal: number,
  value: string,
  options: ResolveOptions = {}
): Promise<string> {
  const failures: string[] = [];
  for (const hint of hints) {
    try {
      const result = await resolveAndAct(context, { kind: "fill", hint, value }, options);
      return result.strategy;
    } catch (error) {
      failures.push(`'${hint}': ${firstLine(errorMessage(error))}`);
    }
  }

  const inputs = context.locator("input:visible");
  const count = await inputs.count().catch(() => 0);
  if (count > ordinal) {
    await inputs.nth(ordinal).fill(value, { timeout: options.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS });
    return `position:${ordinal}`;
  }

  failures.push(`position:${ordinal}: only ${count} visible inputs`);
  throw new ElementNotFoundError(`fill ${hints.map((hint) => `'${hint}'`).join(" or ")}`, failures);
}

const CHAT_INPUT_SELECTOR =
  'input[placeholder*="reply" i], input[placeholder*="write" i], textarea[placeholder*="reply" i], textarea[placeholder*="write" i]';

export async function typeInChat(
  context: AutomationContext,
  message: string,
  options: ResolveOptions & { timeoutMs?: number } = {}
): Promise<string> {
  const strategies: Strategy[] = [
    {
      label: "chat-reply-box",
      attempt: async (ctx, timeoutMs) => {
        const input = ctx.locator(CHAT_INPUT_SELECTOR).first();
        await input.waitFor({ state: "visible", timeout: options.timeoutMs ?? timeoutMs });
        await input.fill(message, { timeout: timeoutMs });
        await input.press("Enter", { timeout: timeoutMs });
      }
    },
    {
      label: "last-visible-input",
      attempt: async (ctx, timeoutMs) => {
        const input = ctx.locator(INPUT_LIKE_SELECTOR).last();
        await input.fill(message, { timeout: timeoutMs });
        await input.press("Enter", { timeout: timeoutMs });
      }
    }
  ];

  const result = await runStrategies(
    context,
    strategies,
    `type '${message}'`,
    options.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS
  );
  return result.strategy;
}

function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}
