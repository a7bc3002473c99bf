import { fetch } from "undici";
import { errorMessage, NotificationDeliveryError } from "./errors.js";
import type { Logger } from "./logger.js";
import type {
  ProgressPhase,
  StatusEnvelope,
  VerificationEnvelope,
  VerificationResult,
  VerifyRequest
} from "./types.js";

type Envelope = StatusEnvelope | VerificationEnvelope;

export interface PhaseEntry {
  phase: ProgressPhase;
  progress: number;
}

/** Step id to reported phase. Percentages never decrease along the plan. */
export const PHASE_TABLE: Readonly<Record<string, PhaseEntry>> = {
  launch_browser: { phase: "browser_started", progress: 5 },
  navigate: { phase: "page_loaded", progress: 10 },
  wait_chatbot: { phase: "chatbot_ready", progress: 15 },
  select_code_email: { phase: "booking_lookup", progress: 20 },
  fill_booking: { phase: "booking_verified", progress: 30 },
  select_reason: { phase: "reason_selected", progress: 40 },
  confirm_documents: { phase: "documents_confirmed", progress: 50 },
  fill_name: { phase: "passenger_details", progress: 60 },
  contact_email: { phase: "contact_details", progress: 70 },
  fill_phone: { phase: "contact_details", progress: 75 },
  submit_comment: { phase: "comment_submitted", progress: 80 },
  upload_documents: { phase: "documents_uploaded", progress: 90 },
  get_confirmation: { phase: "confirmation_received", progress: 95 },
  decline_another: { phase: "completed", progress: 100 }
};

export function phaseFor(stepId: string): PhaseEntry | undefined {
  return Object.prototype.hasOwnProperty.call(PHASE_TABLE, stepId) ? PHASE_TABLE[stepId] : undefined;
}

export interface NotificationTarget {
  jobId: string;
  claimId?: string;
  callbackUrl?: string;
}

export interface ProgressNotifierOptions {
  timeoutMs: number;
  logger: Logger;
  now?: () => Date;
}

/**
 * Best-effort status callbacks. Deliveries are fire-and-forget; failures are
 * logged and never reach the step runner.
 */
export class ProgressNotifier {
  private readonly pending = new Set<Promise<void>>();
  private readonly lastProgress = new Map<string, number>();

  constructor(private readonly options: ProgressNotifierOptions) {}

  notifyStep(target: NotificationTarget, stepId: string, stepName: string, caseNumber?: string | null): void {
    const entry = phaseFor(stepId);
    if (!entry) {
      this.options.logger.debug({ stepId }, "No phase mapped for step");
      return;
    }

    const progress = Math.max(entry.progress, this.lastProgress.get(target.jobId) ?? 0);
    this.lastProgress.set(target.jobId, progress);

    const envelope: StatusEnvelope = {
      ...this.base(target),
      status: entry.phase,
      step: stepName,
      progress
    };
    if (caseNumber) {
      envelope.caseNumber = caseNumber;
    }
    this.send(target, envelope);
  }

  notifyFailure(target: NotificationTarget, stepId: string, stepName: string, error: string): void {
    const envelope: StatusEnvelope = {
      ...this.base(target),
      status: "failed",
      step: stepName,
      progress: this.lastProgress.get(target.jobId) ?? 0,
      error
    };
    const entry = phaseFor(stepId);
    if (entry) {
      envelope.failedPhase = entry.phase;
    }
    this.lastProgress.delete(target.jobId);
    this.send(target, envelope);
  }

  notifyVerification(target: NotificationTarget, request: VerifyRequest, result: VerificationResult): void {
    const envelope: VerificationEnvelope = {
      ...this.base(target),
      type: "booking_verification",
      verified: result.verified,
      status: result.status,
      bookingCode: request.bookingCode,
      bookingEmail: request.bookingEmail
    };
    if (result.bookingDetails) {
      envelope.bookingDetails = result.bookingDetails;
    }
    if (result.error) {
      envelope.error = result.error;
    }
    this.send(target, envelope);
  }

  /** Forgets per-job progress once a job is terminal. */
  release(jobId: string): void {
    this.lastProgress.delete(jobId);
  }

  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private base(target: NotificationTarget): Pick<StatusEnvelope, "claimId" | "jobId" | "timestamp"> {
    return {
      claimId: target.claimId ?? target.jobId,
      jobId: target.jobId,
      timestamp: (this.options.now ?? (() => new Date()))().toISOString()
    };
  }

  private send(target: NotificationTarget, envelope: Envelope): void {
    const url = target.callbackUrl;
    if (!url) {
      return;
    }

    const delivery = this.deliver(url, envelope).catch((error: unknown) => {
      const failure =
        error instanceof NotificationDeliveryError
          ? error
          : new NotificationDeliveryError(url, errorMessage(error));
      this.options.logger.warn(
        { jobId: envelope.jobId, status: envelope.status, url, httpStatus: failure.status, error: failure.message },
        "Status callback failed"
      );
    });

    this.pending.add(delivery);
    void delivery.finally(() => {
      this.pending.delete(delivery);
    });
  }

  private async deliver(url: string, envelope: Envelope): Promise<void> {
    const response = await fetch(url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(envelope),
      signal: AbortSignal.timeout(this.options.timeoutMs)
    });
    await response.body?.cancel();

    if (!response.ok) {
      throw new NotificationDeliveryError(url, `Callback responded with HTTP ${response.status}`, response.status);
    }
    this.options.logger.debug({ jobId: envelope.jobId, status: envelope.status }, "Status callback delivered");
  }
}
