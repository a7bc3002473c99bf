export const REFUND_REASONS = [
  "ILL OR HAVING SURGERY",
  "PREGNANT",
  "COURT SUMMONS OR SERVICE AT POLLING STATION",
  "SOMEONE'S DEATH"
] as const;

export type RefundReason = (typeof REFUND_REASONS)[number];

export interface DocumentInput {
  filename: string;
  url?: string;
  base64?: string;
}

export interface ClaimRequest {
  bookingCode: string;
  bookingEmail: string;
  reason: RefundReason;
  firstName: string;
  surname: string;
  contactEmail: string;
  phoneCountry: string;
  phoneNumber: string;
  comment?: string;
  documents: DocumentInput[];
  claimId?: string;
  callbackUrl?: string;
}

export interface DocumentReference {
  filename: string;
  source: "inline" | "remote";
}

export type ClaimSummary = Omit<ClaimRequest, "documents"> & {
  documents: DocumentReference[];
};

export type JobStatus = "queued" | "running" | "completed" | "failed";

export interface StepErrorRecord {
  step: string;
  message: string;
  evidence?: string;
}

export interface EvidenceArtifact {
  sequence: number;
  label: string;
  path: string;
  capturedAt: string;
}

export interface JobRecord {
  id: string;
  status: JobStatus;
  request: ClaimSummary;
  completedSteps: string[];
  errors: StepErrorRecord[];
  evidence: EvidenceArtifact[];
  caseNumber: string | null;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
}

export type JobPatch = Partial<Omit<JobRecord, "id" | "request" | "createdAt">>;

export interface RunProgress {
  completedSteps: string[];
  errors: StepErrorRecord[];
  evidence: EvidenceArtifact[];
  caseNumber: string | null;
}

export interface RunOutcome extends RunProgress {
  success: boolean;
}

export type ReferenceSource = "labeled" | "generic";

export interface ExtractedReference {
  value: string;
  source: ReferenceSource;
  pattern: string;
}

export type ProgressPhase =
  | "browser_started"
  | "page_loaded"
  | "chatbot_ready"
  | "booking_lookup"
  | "booking_verified"
  | "reason_selected"
  | "documents_confirmed"
  | "passenger_details"
  | "contact_details"
  | "comment_submitted"
  | "documents_uploaded"
  | "confirmation_received"
  | "completed";

export interface StatusEnvelope {
  claimId: string;
  jobId: string;
  status: ProgressPhase | "failed";
  step: string;
  progress: number;
  timestamp: string;
  caseNumber?: string;
  failedPhase?: ProgressPhase;
  error?: string;
}

export interface VerifyRequest {
  bookingCode: string;
  bookingEmail: string;
  claimId?: string;
  callbackUrl?: string;
}

export type FlightDirection = "outbound" | "return";

export interface FlightDetails {
  flightDate?: string;
  direction?: FlightDirection;
  originCity?: string;
  destinationCity?: string;
  origin?: string;
  destination?: string;
  originTerminal?: string;
  destinationTerminal?: string;
  departureTime?: string;
  arrivalTime?: string;
  flightNumber?: string;
}

/** The first flight's fields are repeated at the top level. */
export interface BookingDetails extends FlightDetails {
  bookingCode: string;
  exists: true;
  flights: FlightDetails[];
  passengers?: number;
}

export type VerificationStatus = "verified" | "not_found" | "error";

export interface VerificationResult {
  id: string;
  bookingCode: string;
  verified: boolean;
  status: VerificationStatus;
  bookingDetails: BookingDetails | null;
  error: string | null;
}

export interface VerificationEnvelope {
  claimId: string;
  jobId: string;
  type: "booking_verification";
  verified: boolean;
  status: VerificationStatus;
  bookingCode: string;
  bookingEmail: string;
  timestamp: string;
  bookingDetails?: BookingDetails;
  error?: string;
}

export type StepEvent =
  | { type: "step:start"; step: string; attempt: number; retries: number }
  | { type: "step:retry"; step: string; attempt: number; retries: number; message: string; backoffMs: number }
  | { type: "step:success"; step: string; attempt: number; durationMs: number }
  | { type: "step:failure"; step: string; attempt: number; message: string; evidence?: string };
