import { z } from "zod";
import { REFUND_REASONS, type ClaimRequest, type ClaimSummary, type VerifyRequest } from "./types.js";

const documentSchema = z
  .object({
    filename: z.string().min(1),
    url: z.string().url().optional(),
    base64: z.string().min(1).optional()
  })
  .superRefine((value, context) => {
    if ((value.url === undefined) === (value.base64 === undefined)) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Exactly one of url or base64 is required",
        path: ["url"]
      });
    }
  });

export const claimRequestSchema = z.object({
  bookingCode: z.string().trim().min(1),
  bookingEmail: z.string().trim().email(),
  reason: z
    .string()
    .trim()
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(REFUND_REASONS))
    .default("ILL OR HAVING SURGERY"),
  firstName: z.string().trim().min(1),
  surname: z.string().trim().min(1),
  contactEmail: z.string().trim().email(),
  phoneCountry: z
    .string()
    .trim()
    .regex(/^\+?\d{1,4}$/, "Expected a dialling prefix such as +34")
    .default("+92"),
  phoneNumber: z.string().trim().min(4),
  comment: z.string().trim().optional(),
  documents: z.array(documentSchema).default([]),
  claimId: z.string().min(1).optional(),
  callbackUrl: z.string().url().optional()
});

export const verifyRequestSchema = z.object({
  bookingCode: z.string().trim().min(1),
  bookingEmail: z.string().trim().email(),
  claimId: z.string().min(1).optional(),
  callbackUrl: z.string().url().optional()
});

export type ParsedClaimRequest = z.infer<typeof claimRequestSchema>;

export function parseClaimRequest(raw: unknown): ClaimRequest {
  return claimRequestSchema.parse(raw);
}

export function summarizeClaim(request: ClaimRequest): ClaimSummary {
  return {
    ...request,
    documents: request.documents.map((document) => ({
      filename: document.filename,
      source: document.base64 !== undefined ? "inline" : "remote"
    }))
  };
}

export function parseVerifyRequest(raw: unknown): VerifyRequest {
  return verifyRequestSchema.parse(raw);
}
