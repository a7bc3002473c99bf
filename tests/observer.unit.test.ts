import { describe, expect, it } from "vitest";
import { summarizeClaim } from "../src/contracts.js";
import { formatJobSummary, formatStepEvent, formatVerification } from "../src/observer.js";
import { sampleClaim } from "./helpers/claims.js";

describe("step event formatting", () => {
  it("formats each event kind on one line", () => {
    expect(formatStepEvent({ type: "step:start", step: "Navigate", attempt: 1, retries: 2 })).toBe("[step] Navigate");
    expect(formatStepEvent({ type: "step:start", step: "Navigate", attempt: 2, retries: 2 })).toBe(
      "[step] Navigate (attempt 2/2)"
    );
    expect(
      formatStepEvent({
        type: "step:retry",
        step: "Navigate",
        attempt: 1,
        retries: 2,
        message: "timeout",
        backoffMs: 3_000
      })
    ).toBe("[retry] Navigate failed attempt 1/2: timeout (waiting 3000ms)");
    expect(formatStepEvent({ type: "step:success", step: "Navigate", attempt: 1, durationMs: 42 })).toBe(
      "[ok] Navigate 42ms"
    );
    expect(
      formatStepEvent({ type: "step:failure", step: "Navigate", attempt: 2, message: "timeout", evidence: "e.png" })
    ).toBe("[failed] Navigate: timeout -> e.png");
  });
});

describe("job summary formatting", () => {
  it("lists the outcome, case number and errors", () => {
    const lines = formatJobSummary({
      id: "job-1",
      status: "failed",
      request: summarizeClaim(sampleClaim()),
      completedSteps: ["Launch Browser", "Navigate"],
      errors: [{ step: "Wait for Chatbot", message: "no widget" }],
      evidence: [],
      caseNumber: null,
      createdAt: "2026-01-01T00:00:00.000Z",
      startedAt: null,
      completedAt: null
    });

    expect(lines).toEqual([
      "Job job-1: failed",
      "Booking: EHZRMC | reason: PREGNANT",
      "Steps completed: 2",
      "Error in Wait for Chatbot: no widget"
    ]);
  });
});

describe("verification formatting", () => {
  it("lists each flight and the passenger count", () => {
    expect(
      formatVerification({
        id: "v-1",
        bookingCode: "EHZRMC",
        verified: true,
        status: "verified",
        error: null,
        bookingDetails: {
          bookingCode: "EHZRMC",
          exists: true,
          passengers: 2,
          flights: [
            { flightNumber: "VY8012", flightDate: "12/05/2026", origin: "BCN", destination: "ORY" },
            { originCity: "Paris" }
          ]
        }
      })
    ).toEqual(["Booking EHZRMC: verified", "Flight: VY8012 | 12/05/2026 | BCN -> ORY", "Flight: Paris", "Passengers: 2"]);
  });

  it("shows the error for a missing booking", () => {
    expect(
      formatVerification({
        id: "v-2",
        bookingCode: "QWERTY",
        verified: false,
        status: "not_found",
        bookingDetails: null,
        error: "Booking not found or invalid credentials"
      })
    ).toEqual(["Booking QWERTY: not_found", "Error: Booking not found or invalid credentials"]);
  });
});
