export * from "./types.js";
export * from "./errors.js";
export { loadConfig, type AppConfig, type TimingConfig } from "./config.js";
export { buildLoggerOptions, createLogger, logger, silentLogger, type Logger, type LoggerSettings } from "./logger.js";
export {
  claimRequestSchema,
  parseClaimRequest,
  parseVerifyRequest,
  summarizeClaim,
  verifyRequestSchema
} from "./contracts.js";
export { systemClock, type Clock } from "./clock.js";
export * from "./automation.js";
export { awaitChange, detectChange, waitForResponse, CONTENT_SELECTORS } from "./change-detector.js";
export {
  clickFirst,
  clickStrategies,
  fillByHintOrPosition,
  fillStrategies,
  resolveAndAct,
  runStrategies,
  typeInChat,
  type ActionResult,
  type Intent,
  type Strategy
} from "./element-resolver.js";
export { extractReference, GENERIC_REFERENCE_PATTERN, LABELED_REFERENCE_PATTERNS } from "./reference.js";
export { EvidenceRecorder, listEvidenceFiles } from "./evidence.js";
export { StepRunner, type StepContext, type StepDefinition, type StepRunnerHooks } from "./step-runner.js";
export { CLAIM_STEP_PLAN, claimStepNames, reasonVariants } from "./steps.js";
export { JobStore } from "./job-store.js";
export { JobQueue } from "./job-queue.js";
export { WorkerPool } from "./worker-pool.js";
export { PHASE_TABLE, ProgressNotifier, phaseFor } from "./notifier.js";
export { AttachmentResolver, ALLOWED_EXTENSIONS } from "./attachments.js";
export { PlaywrightSession, playwrightSessionFactory } from "./playwright-session.js";
export { BookingVerifier, parseDateLine, parseFlightNumber } from "./verify.js";
export { ClaimService, type ClaimServiceOptions } from "./service.js";
