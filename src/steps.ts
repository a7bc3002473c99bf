import type { AutomationContext, AutomationPage } from "./automation.js";
import {
  clickFirst,
  fillByHintOrPosition,
  runStrategies,
  typeInChat,
  type Strategy
} from "./element-resolver.js";
import { errorMessage, firstLine } from "./errors.js";
import { extractReference } from "./reference.js";
import type { StepContext, StepDefinition } from "./step-runner.js";

export const REASON_VARIANTS: Record<string, string[]> = {
  "ILL OR HAVING SURGERY": ["ILL OR HAVING SURGERY", "Ill or having surgery", "ILL"],
  PREGNANT: ["PREGNANT", "Pregnant", "pregnant"],
  "COURT SUMMONS OR SERVICE AT POLLING STATION": [
    "COURT SUMMONS OR SERVICE AT POLLING STATION",
    "Court summons or service at polling station",
    "COURT SUMMONS",
    "Court summons"
  ],
  "SOMEONE'S DEATH": ["SOMEONE'S DEATH", "Someone's death", "SOMEONE’S DEATH", "Someone's Death"]
};

/** Configured text first, then the known widget phrasings for that reason. */
export function reasonVariants(reason: string): string[] {
  const known = REASON_VARIANTS[reason.trim().toUpperCase()] ?? [];
  return [reason, ...known.filter((variant) => variant !== reason)];
}

const COOKIE_SELECTORS = [
  'button:has-text("Accept")',
  'button:has-text("Aceptar")',
  'button[id*="cookie"]',
  "#onetrust-accept-btn-handler",
  'button:has-text("I agree")',
  'button:has-text("OK")'
];

const CHATBOT_SELECTORS = [
  "iframe[src*='chat']",
  "iframe[src*='bot']",
  "[class*='chat']",
  "[class*='webchat']",
  "[id*='webchat']",
  "[data-testid*='chat']"
];

const SEND_VARIANTS = ["SEND", "Send", "send", "Enviar"];

async function tryClick(context: StepContext, widget: AutomationContext, variants: string[]): Promise<string | null> {
  try {
    return await clickFirst(widget, variants, { attemptTimeoutMs: context.timing.attemptTimeoutMs });
  } catch (error) {
    context.logger.info({ variants, error: firstLine(errorMessage(error)) }, "Optional control not found");
    return null;
  }
}

async function launchBrowser(context: StepContext): Promise<void> {
  await context.openPage();
  context.logger.info("Browser launched");
}

async function navigate(context: StepContext): Promise<void> {
  const page = context.page();
  await page.goto(context.refundUrl, { timeout: context.timing.pageLoadTimeoutMs });
  await context.pause(2_000, 4_000);

  for (const selector of COOKIE_SELECTORS) {
    const button = page.locator(selector).first();
    if (await button.isVisible({ timeout: 2_000 }).catch(() => false)) {
      await button.click({ timeout: context.timing.attemptTimeoutMs });
      context.logger.info({ selector }, "Cookie banner dismissed");
      await context.pause(500, 1_000);
      break;
    }
  }

  await context.capture("page_loaded");
  await context.pause();
}

async function waitForChatbot(context: StepContext): Promise<void> {
  const page = context.page();
  let found: string | null = null;

  for (const selector of CHATBOT_SELECTORS) {
    try {
      await page.waitForSelector(selector, { timeout: 10_000 });
      found = selector;
      break;
    } catch (error) {
      context.logger.debug({ selector, error: firstLine(errorMessage(error)) }, "Chatbot selector not present");
    }
  }

  if (found) {
    context.logger.info({ selector: found }, "Chatbot element found");
  } else {
    context.logger.warn("No chatbot selector matched; waiting before continuing");
    await context.clock.sleep(5_000, context.signal);
  }

  await context.capture("chatbot_loaded");
  await context.pause();
}

async function selectCodeAndEmail(context: StepContext): Promise<void> {
  const widget = await context.widget();
  await context.pause();
  await clickFirst(widget, ["CODE AND EMAIL", "Code and email", "code and email", "code"], {
    attemptTimeoutMs: context.timing.attemptTimeoutMs
  });
  await context.capture("code_email_selected");
  await context.waitForResponse(widget);
  await context.pause();
}

async function fillBookingDetails(context: StepContext): Promise<void> {
  const widget = await context.widget();
  const resolve = { attemptTimeoutMs: context.timing.attemptTimeoutMs };
  await context.pause();

  await fillByHintOrPosition(widget, ["code", "booking"], 0, context.claim.bookingCode, resolve);
  await context.pause(500, 1_500);

  try {
    await fillByHintOrPosition(widget, ["email"], 1, context.claim.bookingEmail, resolve);
  } catch (error) {
    context.logger.warn({ error: firstLine(errorMessage(error)) }, "Booking email field not found");
  }

  await context.capture("booking_filled");
  await context.pause();
  await tryClick(context, widget, SEND_VARIANTS);
  await context.capture("send_clicked");

  await context.waitForResponse(widget, { settleMs: 3_000, fallbackMs: 12_000 });
  await context.pause(2_000, 4_000);
  await context.capture("verification_response");
}

async function selectReason(context: StepContext): Promise<void> {
  const widget = await context.widget();
  await context.pause();
  await context.waitForResponse(widget, { settleMs: 2_000, fallbackMs: 8_000 });

  const chosen = await clickFirst(widget, reasonVariants(context.claim.reason), {
    attemptTimeoutMs: context.timing.attemptTimeoutMs
  });
  context.logger.info({ reason: context.claim.reason, matched: chosen }, "Reason selected");
  await context.capture("reason_selected");
  await context.waitForResponse(widget);
  await context.pause();
}

async function confirmDocuments(context: StepContext): Promise<void> {
  const widget = await context.widget();
  await context.pause(2_000, 4_000);
  await context.waitForResponse(widget);

  await clickFirst(widget, ["YES", "Yes", "yes"], { attemptTimeoutMs: context.timing.attemptTimeoutMs });
  await context.capture("documents_confirmed");
  await context.waitForResponse(widget);
  await context.pause();
}

async function fillName(context: StepContext): Promise<void> {
  const widget = await context.widget();
  const resolve = { attemptTimeoutMs: context.timing.attemptTimeoutMs };
  await context.pause();
  await context.waitForResponse(widget, { settleMs: 2_000, fallbackMs: 8_000 });

  await fillByHintOrPosition(widget, ["first name", "first"], 0, context.claim.firstName, resolve);
  await context.pause(300, 800);

  try {
    await fillByHintOrPosition(widget, ["surname", "last name"], 1, context.claim.surname, resolve);
  } catch (error) {
    context.logger.warn({ error: firstLine(errorMessage(error)) }, "Surname field not found");
  }

  await context.capture("name_filled");
  await context.pause();
  await tryClick(context, widget, SEND_VARIANTS);

  await context.waitForResponse(widget, { settleMs: 3_000, fallbackMs: 10_000 });
  await context.pause();
  await context.capture("name_sent");
}

async function enterContactEmail(context: StepContext): Promise<void> {
  const widget = await context.widget();
  await context.pause();
  await context.waitForResponse(widget);

  const via = await typeInChat(widget, context.claim.contactEmail, {
    attemptTimeoutMs: context.timing.attemptTimeoutMs
  });
  context.logger.info({ via }, "Contact email sent");
  await context.capture("contact_email_sent");
  await context.waitForResponse(widget, { settleMs: 3_000, fallbackMs: 12_000 });
  await context.pause(2_000, 4_000);
}

const PREFIX_TRIGGER_SELECTORS = [
  ':text("Choose a prefix")',
  '[class*="prefix"]:visible',
  '[class*="country"]:visible',
  '[class*="dropdown"]:visible',
  '[class*="select"]:visible'
];

const PREFIX_OPTION_SELECTOR = '[class*="option"]:visible, li:visible, [role="option"]:visible';

export async function selectPhonePrefix(
  widget: AutomationContext,
  phoneCountry: string,
  attemptTimeoutMs: number
): Promise<string | null> {
  const prefix = phoneCountry.replace(/^\+/, "");
  const patterns = [`(+${prefix})`, `+${prefix}`];

  for (const selector of PREFIX_TRIGGER_SELECTORS) {
    try {
      const trigger = widget.locator(selector).first();
      await trigger.waitFor({ state: "visible", timeout: attemptTimeoutMs * 2 });
      await trigger.click({ timeout: attemptTimeoutMs });
    } catch {
      continue;
    }

    for (const pattern of patterns) {
      const option = widget.getByText(pattern, { exact: false }).first();
      const visible = await option
        .waitFor({ state: "visible", timeout: attemptTimeoutMs })
        .then(() => true)
        .catch(() => false);
      if (visible) {
        await option.click({ timeout: attemptTimeoutMs });
        return `dropdown:${pattern}`;
      }
    }

    const options = widget.locator(PREFIX_OPTION_SELECTOR);
    const count = await options.count().catch(() => 0);
    for (let index = 0; index < count; index += 1) {
      const option = options.nth(index);
      const text = (await option.textContent({ timeout: attemptTimeoutMs })) ?? "";
      if (patterns.some((pattern) => text.includes(pattern))) {
        await option.click({ timeout: attemptTimeoutMs });
        return `scan:${text.trim()}`;
      }
    }
  }

  const nativeSelect = widget.locator("select:visible:not([disabled])").first();
  const hasSelect = await nativeSelect
    .waitFor({ state: "visible", timeout: attemptTimeoutMs })
    .then(() => true)
    .catch(() => false);
  if (!hasSelect) {
    return null;
  }

  const options = nativeSelect.locator("option");
  const count = await options.count();
  for (let index = 0; index < count; index += 1) {
    const option = options.nth(index);
    const text = (await option.textContent({ timeout: attemptTimeoutMs })) ?? "";
    const value = (await option.getAttribute("value", { timeout: attemptTimeoutMs })) ?? "";
    if (text.includes(`(+${prefix})`) || value.includes(`+${prefix}`) || value === prefix) {
      await nativeSelect.selectOption(value, { timeout: attemptTimeoutMs });
      return `native:${text.trim()}`;
    }
  }

  return null;
}

export function phoneInputStrategies(phoneNumber: string): Strategy[] {
  const selectors = [
    'input[placeholder*="phone" i]:visible',
    'input[placeholder*="mobile" i]:visible',
    'input[type="tel"]:visible:not([disabled])',
    'input[type="number"]:visible:not([disabled])'
  ];

  const strategies: Strategy[] = selectors.map((selector) => ({
    label: `css:${selector}`,
    attempt: async (widget, timeoutMs) => {
      const input = widget.locator(selector).first();
      await input.waitFor({ state: "visible", timeout: timeoutMs });
      await input.fill(phoneNumber, { timeout: timeoutMs });
    }
  }));

  strategies.push({
    label: "scan:first-empty-text-input",
    attempt: async (widget, timeoutMs) => {
      const inputs = widget.locator('input:visible:not([disabled]):not([type="email"])');
      const count = await inputs.count();
      for (let index = 0; index < count; index += 1) {
        const input = inputs.nth(index);
        const type = (await input.getAttribute("type", { timeout: timeoutMs })) ?? "text";
        const value = (await input.getAttribute("value", { timeout: timeoutMs })) ?? "";
        const placeholder = (await input.getAttribute("placeholder", { timeout: timeoutMs })) ?? "";
        if (["text", "tel", "number"].includes(type) && !value && !placeholder.toLowerCase().includes("prefix")) {
          await input.fill(phoneNumber, { timeout: timeoutMs });
          return;
        }
      }
      throw new Error(`none of ${count} enabled inputs is an empty phone field`);
    }
  });

  return strategies;
}

async function fillPhone(context: StepContext): Promise<void> {
  const widget = await context.widget();
  const attemptTimeoutMs = context.timing.attemptTimeoutMs;
  await context.pause(2_000, 4_000);
  await context.waitForResponse(widget, { settleMs: 3_000, fallbackMs: 12_000 });
  await context.capture("phone_step_ready");

  const prefix = await selectPhonePrefix(widget, context.claim.phoneCountry, attemptTimeoutMs);
  if (prefix) {
    context.logger.info({ via: prefix }, "Phone prefix selected");
  } else {
    context.logger.warn({ phoneCountry: context.claim.phoneCountry }, "Phone prefix not selectable; keeping default");
  }
  await context.pause(500, 1_000);
  await context.capture("prefix_selected");

  await runStrategies(widget, phoneInputStrategies(context.claim.phoneNumber), "fill phone number", attemptTimeoutMs);
  await context.capture("phone_filled");
  await context.pause();
  await tryClick(context, widget, ["SEND", "Send"]);

  await context.waitForResponse(widget, { settleMs: 3_000, fallbackMs: 10_000 });
  await context.pause();
  await context.capture("phone_sent");
}

async function submitComment(context: StepContext): Promise<void> {
  const widget = await context.widget();
  await context.pause();
  await context.waitForResponse(widget);

  const comment = context.claim.comment?.trim();
  if (comment) {
    try {
      const textarea = widget.locator("textarea:visible").first();
      await textarea.waitFor({ state: "visible", timeout: 10_000 });
      await textarea.fill(comment, { timeout: context.timing.attemptTimeoutMs });
    } catch (error) {
      context.logger.info({ error: firstLine(errorMessage(error)) }, "No comment box found; submitting without text");
    }
  }

  await context.capture("comment_filled");
  await context.pause();
  await tryClick(context, widget, ["SUBMIT QUERY", "Submit query", "SUBMIT", "Submit"]);

  await context.waitForResponse(widget, {
    settleMs: 3_000,
    fallbackMs: 12_000,
    expectSelector: "input[type='file'], button:has-text('Select')"
  });
  await context.pause(2_000, 4_000);
  await context.capture("comment_submitted");
}

const FILE_BUTTON_SELECTORS = [
  'button:has-text("Select them")',
  'button:has-text("Select")',
  'button:has-text("Browse")',
  'button:has-text("Upload")',
  'button:has-text("Attach")',
  '[class*="upload"] button',
  '[class*="attach"] button'
];

async function clickFileButton(widget: AutomationContext, selectors: string[]): Promise<boolean> {
  for (const selector of selectors) {
    const button = widget.locator(selector).first();
    if (await button.isVisible({ timeout: 2_000 }).catch(() => false)) {
      await button.click();
      return true;
    }
  }
  return false;
}

export async function uploadFiles(
  page: AutomationPage,
  widget: AutomationContext,
  paths: string[],
  timeoutMs = 10_000
): Promise<string> {
  try {
    const fileInput = widget.locator('input[type="file"]').first();
    await fileInput.waitFor({ state: "attached", timeout: timeoutMs });

    try {
      await page.chooseFiles(
        async () => {
          if (!(await clickFileButton(widget, FILE_BUTTON_SELECTORS))) {
            await fileInput.dispatchClick();
          }
        },
        paths,
        { timeout: timeoutMs }
      );
      return "file-chooser";
    } catch {
      await fileInput.setInputFiles(paths, { timeout: timeoutMs });
      return "input";
    }
  } catch (primaryError) {
    try {
      for (const path of paths) {
        await page.chooseFiles(
          async () => {
            await clickFileButton(widget, FILE_BUTTON_SELECTORS.slice(0, 4));
          },
          [path],
          { timeout: timeoutMs }
        );
      }
      return "file-chooser-per-file";
    } catch (fallbackError) {
      throw new Error(
        `File upload failed: ${firstLine(errorMessage(fallbackError))} (after ${firstLine(errorMessage(primaryError))})`
      );
    }
  }
}

async function uploadDocuments(context: StepContext): Promise<void> {
  const widget = await context.widget();
  await context.pause();
  await context.waitForResponse(widget);

  if (context.documentPaths.length === 0) {
    context.logger.info("No documents to upload");
    await context.capture("no_documents");
    return;
  }

  const via = await uploadFiles(context.page(), widget, context.documentPaths);
  context.logger.info({ count: context.documentPaths.length, via }, "Documents uploaded");
  await context.pause(2_000, 3_000);
  await context.capture("documents_uploaded");
  await context.waitForResponse(widget);
  await context.pause();

  const confirmations = ["Yes, continue", "YES, CONTINUE", "Yes", "Continue"].map<Strategy>((text) => ({
    label: text,
    attempt: async (ctx, timeoutMs) => {
      const button = ctx.locator(`button:has-text("${text}")`).first();
      await button.waitFor({ state: "visible", timeout: timeoutMs });
      await button.click({ timeout: timeoutMs });
    }
  }));
  try {
    const confirmed = await runStrategies(widget, confirmations, "confirm documents", context.timing.attemptTimeoutMs);
    context.logger.info({ via: confirmed.strategy }, "Document upload confirmed");
    await context.pause(1_000, 2_000);
    await context.capture("upload_confirmed");
  } catch (error) {
    context.logger.info({ error: firstLine(errorMessage(error)) }, "No upload confirmation prompt");
  }

  await context.waitForResponse(widget);
  await context.pause();
}

async function getConfirmation(context: StepContext): Promise<void> {
  const widget = await context.widget();
  await context.pause(2_000, 4_000);
  await context.waitForResponse(widget);

  try {
    const text = (await widget.locator("body").textContent({ timeout: context.timing.attemptTimeoutMs })) ?? "";
    const reference = extractReference(text);
    if (reference) {
      context.setCaseNumber(reference.value);
      context.logger.info({ caseNumber: reference.value, source: reference.source }, "Case number found");
    } else {
      context.logger.warn("No case number in confirmation text");
    }
  } catch (error) {
    context.logger.warn({ error: firstLine(errorMessage(error)) }, "Could not read confirmation text");
  }

  await context.capture("confirmation");
}

async function declineAnother(context: StepContext): Promise<void> {
  const widget = await context.widget();
  await context.pause();

  if (await tryClick(context, widget, ["NO", "No", "no"])) {
    await context.capture("declined_another");
    await context.pause();
    return;
  }
  await context.capture("final_state");
}

export const CLAIM_STEP_PLAN: readonly StepDefinition[] = [
  { id: "launch_browser", name: "Launch Browser", retries: 2, run: launchBrowser },
  { id: "navigate", name: "Navigate", retries: 2, run: navigate },
  { id: "wait_chatbot", name: "Wait for Chatbot", retries: 1, run: waitForChatbot },
  {
    id: "select_code_email",
    name: "Select CODE AND EMAIL",
    retries: 2,
    run: selectCodeAndEmail,
    postCondition: { selector: "input:visible" }
  },
  { id: "fill_booking", name: "Fill Booking Details", retries: 2, run: fillBookingDetails },
  { id: "select_reason", name: "Select Reason", retries: 3, run: selectReason },
  { id: "confirm_documents", name: "Confirm Documents", retries: 3, run: confirmDocuments },
  { id: "fill_name", name: "Fill Name", retries: 2, run: fillName },
  {
    id: "contact_email",
    name: "Contact Email",
    retries: 2,
    run: enterContactEmail,
    postCondition: { selector: ':text("Choose a prefix"), input[type="tel"]:visible, select:visible' }
  },
  { id: "fill_phone", name: "Fill Phone", retries: 2, run: fillPhone },
  { id: "submit_comment", name: "Submit Comment", retries: 2, run: submitComment },
  { id: "upload_documents", name: "Upload Documents", retries: 2, run: uploadDocuments },
  { id: "get_confirmation", name: "Get Confirmation", retries: 1, run: getConfirmation },
  { id: "decline_another", name: "Decline Another", retries: 1, run: declineAnother }
];

export function claimStepNames(plan: readonly StepDefinition[] = CLAIM_STEP_PLAN): string[] {
  return plan.map((step) => step.name);
}
