import type { JobRecord, StepEvent, VerificationResult } from "./types.js";

export function formatStepEvent(event: StepEvent): string {
  switch (event.type) {
    case "step:start":
      return event.attempt > 1
        ? `[step] ${event.step} (attempt ${event.attempt}/${event.retries})`
        : `[step] ${event.step}`;
    case "step:retry":
      return `[retry] ${event.step} failed attempt ${event.attempt}/${event.retries}: ${event.message} (waiting ${event.backoffMs}ms)`;
    case "step:success":
      return `[ok] ${event.step} ${event.durationMs}ms`;
    case "step:failure":
      return event.evidence
        ? `[failed] ${event.step}: ${event.message} -> ${event.evidence}`
        : `[failed] ${event.step}: ${event.message}`;
  }
}

export function formatJobSummary(record: JobRecord): string[] {
  const lines = [
    `Job ${record.id}: ${record.status}`,
    `Booking: ${record.request.bookingCode} | reason: ${record.request.reason}`,
    `Steps completed: ${record.completedSteps.length}`
  ];

  if (record.caseNumber) {
    lines.push(`Case number: ${record.caseNumber}`);
  }
  for (const entry of record.errors) {
    lines.push(`Error in ${entry.step}: ${entry.message}`);
  }
  if (record.evidence.length > 0) {
    lines.push(`Evidence: ${record.evidence.length} snapshot(s)`);
  }
  return lines;
}

export function formatVerification(result: VerificationResult): string[] {
  const lines = [`Booking ${result.bookingCode}: ${result.status}`];
  const details = result.bookingDetails;
  if (details) {
    for (const flight of details.flights) {
      const route = [flight.origin ?? flight.originCity, flight.destination ?? flight.destinationCity]
        .filter(Boolean)
        .join(" -> ");
      const parts = [flight.flightNumber, flight.flightDate, route].filter(Boolean);
      lines.push(`Flight: ${parts.join(" | ") || "details unavailable"}`);
    }
    if (details.passengers !== undefined) {
      lines.push(`Passengers: ${details.passengers}`);
    }
  }
  if (result.error) {
    lines.push(`Error: ${result.error}`);
  }
  return lines;
}
