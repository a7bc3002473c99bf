import type { AutomationPage, AutomationSessionFactory, UiElement } from "./automation.js";
import { systemClock, type Clock } from "./clock.js";
import type { TimingConfig } from "./config.js";
import { errorMessage, firstLine, JobCancelledError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { BookingDetails, FlightDetails, VerificationResult, VerifyRequest } from "./types.js";

export const COOKIE_ACCEPT_SELECTORS = [
  "button#onetrust-accept-btn-handler",
  "button[id*='accept']",
  "button:has-text('Accept')"
];

export const LOOKUP_SELECTORS = {
  bookingCode: "input[id*='CONFIRMATIONNUMBER'], input[id*='InputCode'], input[name*='CONFIRMATIONNUMBER']",
  email: "input[id*='CONTACTEMAIL'], input[id*='InputEmail'], input[name*='CONTACTEMAIL']",
  retrieve: "a[id*='LinkButtonRetrieve'], a.btn--primary:has-text('Go')"
};

export const RESULT_SELECTORS = {
  anyFlight: ".flightDetailsBox, .flightDetailsBox__date, [class*='flightDetailsBox']",
  flightLists: [".sectionBorderTab.flightDetailsBox", "[class*='flightDetailsBox'][class*='sectionBorderTab']"],
  singleFlight: ".flightDetailsBox",
  date: ".flightDetailsBox__date",
  place: ".flightDetailsBox__infoFLight__place",
  terminal: ".flightDetailsBox__infoFLight__terminal",
  time: ".flightDetailsBox__infoFLight__time",
  content: ".flightDetailsBox__infoFLight__sectionContent"
};

export const BOOKING_NOT_FOUND = "Booking not found or invalid credentials";

export interface BookingVerifierOptions {
  sessionFactory: AutomationSessionFactory;
  verifyUrl: string;
  timing: TimingConfig;
  logger: Logger;
  clock?: Clock;
  signal?: AbortSignal;
}

/**
 * Looks a booking up on the airline's retrieve-booking page and reads the
 * flight summary when it exists. Runs synchronously for the caller; nothing
 * is queued.
 */
export class BookingVerifier {
  private readonly clock: Clock;

  constructor(private readonly options: BookingVerifierOptions) {
    this.clock = options.clock ?? systemClock;
  }

  async verify(id: string, request: VerifyRequest): Promise<VerificationResult> {
    const log = this.options.logger;
    const session = this.options.sessionFactory();
    const base = { id, bookingCode: request.bookingCode };

    try {
      const page = await session.open();
      await this.submitLookup(page, request);
      const details = await this.readBooking(page, request.bookingCode);
      if (!details) {
        log.info({ bookingCode: request.bookingCode }, "Booking not found");
        return { ...base, verified: false, status: "not_found", bookingDetails: null, error: BOOKING_NOT_FOUND };
      }

      log.info({ bookingCode: request.bookingCode, flights: details.flights.length }, "Booking verified");
      return { ...base, verified: true, status: "verified", bookingDetails: details, error: null };
    } catch (error) {
      if (error instanceof JobCancelledError) {
        throw error;
      }
      const message = firstLine(errorMessage(error));
      log.error({ bookingCode: request.bookingCode, error: message }, "Booking verification failed");
      return { ...base, verified: false, status: "error", bookingDetails: null, error: message };
    } finally {
      try {
        await session.close();
      } catch (error) {
        log.warn({ error: errorMessage(error) }, "Failed to close automation session");
      }
    }
  }

  private async submitLookup(page: AutomationPage, request: VerifyRequest): Promise<void> {
    const { signal } = this.options;
    await page.goto(this.options.verifyUrl, { timeout: this.options.timing.pageLoadTimeoutMs });
    await this.clock.sleep(2_000, signal);
    await this.dismissCookies(page);

    const codeInput = page.locator(LOOKUP_SELECTORS.bookingCode).first();
    await codeInput.waitFor({ state: "visible", timeout: 15_000 });
    await codeInput.fill(request.bookingCode);

    const emailInput = page.locator(LOOKUP_SELECTORS.email).first();
    await emailInput.waitFor({ state: "visible", timeout: 10_000 });
    await emailInput.fill(request.bookingEmail);

    const retrieve = page.locator(LOOKUP_SELECTORS.retrieve).first();
    await retrieve.waitFor({ state: "visible", timeout: 10_000 });
    await retrieve.click();
    await this.clock.sleep(3_000, signal);
  }

  private async dismissCookies(page: AutomationPage): Promise<void> {
    for (const selector of COOKIE_ACCEPT_SELECTORS) {
      const button = page.locator(selector).first();
      if (!(await isShown(button, 2_000))) {
        continue;
      }
      try {
        await button.click({ timeout: 2_000 });
      } catch (error) {
        this.options.logger.debug({ selector, error: firstLine(errorMessage(error)) }, "Cookie button not clickable");
        continue;
      }
      await this.clock.sleep(1_000, this.options.signal);
      return;
    }
  }

  private async readBooking(page: AutomationPage, bookingCode: string): Promise<BookingDetails | null> {
    const bodyText = (await page.locator("body").textContent()) ?? "";
    const found =
      (await isShown(page.locator(RESULT_SELECTORS.anyFlight).first(), 5_000)) ||
      (bodyText.toUpperCase().includes(bookingCode.toUpperCase()) && bodyText.includes("Flight"));
    if (!found) {
      return null;
    }

    const flights: FlightDetails[] = [];
    for (const box of await flightBoxes(page)) {
      const flight = await readFlight(box);
      if (Object.keys(flight).length > 0) {
        flights.push(flight);
      }
    }

    const details: BookingDetails = { ...flights[0], bookingCode, exists: true, flights };
    const passengers = parsePassengers(bodyText);
    if (passengers !== undefined) {
      details.passengers = passengers;
    }
    return details;
  }
}

async function isShown(element: UiElement, timeout: number): Promise<boolean> {
  return element
    .waitFor({ state: "visible", timeout })
    .then(() => true)
    .catch(() => false);
}

async function flightBoxes(page: AutomationPage): Promise<UiElement[]> {
  for (const selector of RESULT_SELECTORS.flightLists) {
    const list = page.locator(selector);
    const count = await list.count().catch(() => 0);
    if (count > 0) {
      return Array.from({ length: count }, (_, index) => list.nth(index));
    }
  }
  return [page.locator(RESULT_SELECTORS.singleFlight).first()];
}

async function readText(element: UiElement): Promise<string | null> {
  return element
    .textContent({ timeout: 3_000 })
    .then((text) => text?.trim() ?? null)
    .catch(() => null);
}

async function readTexts(list: UiElement): Promise<string[]> {
  const count = await list.count().catch(() => 0);
  const texts: string[] = [];
  for (let index = 0; index < count; index += 1) {
    texts.push((await readText(list.nth(index))) ?? "");
  }
  return texts;
}

async function readFlight(box: UiElement): Promise<FlightDetails> {
  const flight: FlightDetails = {};

  const dateText = await readText(box.locator(RESULT_SELECTORS.date).first());
  if (dateText) {
    Object.assign(flight, parseDateLine(dateText));
  }

  const [originCity, destinationCity] = await readTexts(box.locator(RESULT_SELECTORS.place));
  if (originCity !== undefined && destinationCity !== undefined) {
    flight.originCity = originCity;
    flight.destinationCity = destinationCity;
  }

  const [originTerminal, destinationTerminal] = await readTexts(box.locator(RESULT_SELECTORS.terminal));
  if (originTerminal !== undefined && destinationTerminal !== undefined) {
    const origin = airportCode(originTerminal);
    const destination = airportCode(destinationTerminal);
    if (origin) {
      flight.origin = origin;
    }
    if (destination) {
      flight.destination = destination;
    }
    flight.originTerminal = originTerminal;
    flight.destinationTerminal = destinationTerminal;
  }

  const [departureTime, arrivalTime] = await readTexts(box.locator(RESULT_SELECTORS.time));
  if (departureTime !== undefined && arrivalTime !== undefined) {
    flight.departureTime = departureTime;
    flight.arrivalTime = arrivalTime;
  }

  const content = await readText(box.locator(RESULT_SELECTORS.content).first());
  const flightNumber = content ? parseFlightNumber(content) : undefined;
  if (flightNumber) {
    flight.flightNumber = flightNumber;
  }

  return flight;
}

export function parseDateLine(text: string): Pick<FlightDetails, "flightDate" | "direction"> {
  const result: Pick<FlightDetails, "flightDate" | "direction"> = {};
  const date = /(\d{1,2}[./]\d{1,2}[./]\d{2,4})/.exec(text)?.[1];
  if (date) {
    result.flightDate = date;
  }

  const lower = text.toLowerCase();
  if (lower.includes("outbound")) {
    result.direction = "outbound";
  } else if (lower.includes("inbound") || lower.includes("return")) {
    result.direction = "return";
  }
  return result;
}

export function airportCode(text: string): string | undefined {
  return /([A-Z]{3})/.exec(text)?.[1];
}

export function parseFlightNumber(text: string): string | undefined {
  return /Flight\s*N[°ºo]?\s*:?\s*([A-Z0-9]{2}\d{1,4})/i.exec(text)?.[1]?.toUpperCase();
}

export function parsePassengers(text: string): number | undefined {
  const match = /(\d+)\s*Adult/i.exec(text)?.[1];
  return match === undefined ? undefined : Number(match);
}
