import { access } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { AttachmentResolver } from "../src/attachments.js";
import type { AppConfig } from "../src/config.js";
import { JobNotFoundError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { ClaimService } from "../src/service.js";
import { claimStepNames } from "../src/steps.js";
import type { DocumentInput } from "../src/types.js";
import { CONFIRMATION_TEXT, makeTempDir, testConfig } from "./helpers/claims.js";
import { FakeClock, fakeSessions, type FakePageOptions } from "./helpers/fakeAutomation.js";
import { startFixtureServer, type RunningFixtureServer } from "./helpers/fixtureServer.js";

function claimPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    bookingCode: "EHZRMC",
    bookingEmail: "traveller@example.com",
    reason: "PREGNANT",
    firstName: "Ana",
    surname: "Lopez",
    contactEmail: "contact@example.com",
    phoneCountry: "+34",
    phoneNumber: "600111222",
    documents: [{ filename: "certificate.pdf", base64: "JVBERi0xLjQK" }],
    ...overrides
  };
}

class BrokenAttachments extends AttachmentResolver {
  override async resolve(_jobId: string, _documents: DocumentInput[]): Promise<string[]> {
    throw new Error("attachment volume is read-only");
  }
}

describe("ClaimService", () => {
  let temp: { dir: string; dispose: () => Promise<void> };
  let server: RunningFixtureServer;
  let service: ClaimService | null = null;
  let ids: number;

  beforeEach(async () => {
    temp = await makeTempDir();
    server = await startFixtureServer({ "/status": { status: 200 } });
    ids = 0;
  });

  afterEach(async () => {
    await service?.stop();
    service = null;
    await server.close();
    await temp.dispose();
  });

  function createService(
    pageOptions: FakePageOptions = { bodyText: CONFIRMATION_TEXT },
    configOverrides: Partial<AppConfig> = {},
    attachments?: AttachmentResolver
  ): { service: ClaimService; fakes: ReturnType<typeof fakeSessions>; config: AppConfig } {
    const fakes = fakeSessions(pageOptions);
    const config = testConfig(temp.dir, configOverrides);
    const created = new ClaimService({
      config,
      logger: silentLogger,
      sessionFactory: fakes.factory,
      clock: new FakeClock(),
      attachments,
      createId: () => {
        ids += 1;
        return `job-${ids}`;
      },
      now: () => new Date("2026-02-10T09:30:00.000Z")
    });
    service = created;
    return { service: created, fakes, config };
  }

  it("completes a claim end to end and cleans up after itself", async () => {
    const { service, fakes, config } = createService();

    const queued = await service.submit(claimPayload({ claimId: "claim-1", callbackUrl: `${server.baseUrl}/status` }));
    expect(queued.status).toBe("queued");
    expect(queued.request.documents).toEqual([{ filename: "certificate.pdf", source: "inline" }]);

    service.start();
    const record = await service.waitFor(queued.id);
    await service.stop();

    expect(record.status).toBe("completed");
    expect(record.caseNumber).toBe("9988776");
    expect(record.completedSteps).toEqual(claimStepNames());
    expect(record.completedSteps).toHaveLength(14);
    expect(record.errors).toEqual([]);
    expect(record.evidence.length).toBeGreaterThan(0);
    expect(record.startedAt).toBe("2026-02-10T09:30:00.000Z");
    expect(record.completedAt).toBe("2026-02-10T09:30:00.000Z");

    expect(fakes.page.uploads).toEqual([[join(config.attachments.rootDir, "job-1", "certificate.pdf")]]);
    await expect(access(join(config.attachments.rootDir, "job-1"))).rejects.toThrow();
    await expect(service.listEvidence("job-1")).resolves.toEqual([]);

    expect(server.received).toHaveLength(14);
    const last = server.received
      .map((request): unknown => JSON.parse(request.body))
      .find((body) => typeof body === "object" && body !== null && "progress" in body && body.progress === 100);
    expect(last).toEqual({
      claimId: "claim-1",
      jobId: "job-1",
      timestamp: "2026-02-10T09:30:00.000Z",
      status: "completed",
      step: "Decline Another",
      progress: 100,
      caseNumber: "9988776"
    });
  });

  it("marks the job failed when a step exhausts its attempts", async () => {
    const { service } = createService({ hidden: (selector) => selector.toLowerCase().includes("pregnant") });

    const queued = await service.submit(claimPayload({ callbackUrl: `${server.baseUrl}/status` }));
    service.start();
    const record = await service.waitFor(queued.id);
    await service.stop();

    expect(record.status).toBe("failed");
    expect(record.caseNumber).toBeNull();
    expect(record.completedSteps).toEqual(claimStepNames().slice(0, 5));
    expect(record.errors.map((entry) => entry.step)).toEqual(["Select Reason"]);

    const failure = server.received
      .map((request): unknown => JSON.parse(request.body))
      .find((body) => typeof body === "object" && body !== null && "status" in body && body.status === "failed");
    expect(failure).toMatchObject({ status: "failed", failedPhase: "reason_selected", progress: 30 });
  });

  it("records unexpected errors as a worker failure", async () => {
    const attachments = new BrokenAttachments({
      rootDir: join(temp.dir, "attachments"),
      maxTotalBytes: 1_024,
      logger: silentLogger
    });
    const { service, fakes } = createService(undefined, {}, attachments);

    const queued = await service.submit(claimPayload());
    service.start();
    const record = await service.waitFor(queued.id);

    expect(record.status).toBe("failed");
    expect(record.errors).toEqual([{ step: "worker", message: "attachment volume is read-only" }]);
    expect(fakes.sessions).toHaveLength(0);
  });

  it("keeps evidence when configured to", async () => {
    const { service, config } = createService(undefined, {
      evidence: { rootDir: join(temp.dir, "kept"), keep: true }
    });

    const queued = await service.submit(claimPayload({ documents: [] }));
    service.start();
    await service.waitFor(queued.id);

    const files = await service.listEvidence(queued.id);
    expect(files[0]).toBe(join(config.evidence.rootDir, "job-1", "01_page_loaded.png"));
    expect(files.every((file) => file.endsWith(".png"))).toBe(true);
  });

  it("runs several claims on separate sessions", async () => {
    const { service, fakes } = createService();

    const first = await service.submit(claimPayload());
    const second = await service.submit(claimPayload({ bookingCode: "QWERTY" }));
    service.start();
    const records = await Promise.all([service.waitFor(first.id), service.waitFor(second.id)]);

    expect(records.map((record) => record.status)).toEqual(["completed", "completed"]);
    expect(fakes.sessions).toHaveLength(2);
    expect(fakes.sessions.every((session) => session.closed === 1)).toBe(true);
    expect(service.list().map((record) => record.id)).toEqual(["job-1", "job-2"]);
  });

  it("verifies a booking outside the claim queue and posts the result", async () => {
    const { service, fakes } = createService({ bodyText: "Booking EHZRMC Flight summary 1 Adult" });

    const result = await service.verify({
      bookingCode: "EHZRMC",
      bookingEmail: "traveller@example.com",
      claimId: "claim-7",
      callbackUrl: `${server.baseUrl}/status`
    });
    await service.stop();

    const details = { bookingCode: "EHZRMC", exists: true, flights: [], passengers: 1 };
    expect(result).toEqual({
      id: "job-1",
      bookingCode: "EHZRMC",
      verified: true,
      status: "verified",
      bookingDetails: details,
      error: null
    });
    expect(service.list()).toEqual([]);
    expect(fakes.sessions.map((session) => session.closed)).toEqual([1]);
    expect(server.received.map((request): unknown => JSON.parse(request.body))).toEqual([
      {
        claimId: "claim-7",
        jobId: "job-1",
        timestamp: "2026-02-10T09:30:00.000Z",
        type: "booking_verification",
        verified: true,
        status: "verified",
        bookingCode: "EHZRMC",
        bookingEmail: "traveller@example.com",
        bookingDetails: details
      }
    ]);
  });

  it("rejects malformed verification requests", async () => {
    const { service, fakes } = createService();

    await expect(service.verify({ bookingCode: "EHZRMC", bookingEmail: "nope" })).rejects.toBeInstanceOf(ZodError);
    expect(fakes.sessions).toHaveLength(0);
  });

  it("validates requests and unknown ids", async () => {
    const { service } = createService();

    await expect(service.submit({ bookingCode: "" })).rejects.toBeInstanceOf(ZodError);
    expect(service.get("nope")).toBeUndefined();
    expect(() => service.require("nope")).toThrow(JobNotFoundError);
    expect(service.list()).toEqual([]);
  });
});
