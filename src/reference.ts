import type { ExtractedReference } from "./types.js";

// Most specific first. The generic digit run can also match unrelated numbers
// such as flight numbers; it only runs when no labeled pattern matched.
export const LABELED_REFERENCE_PATTERNS: RegExp[] = [
  /reference[:\s]+(\d+)/i,
  /case number[:\s]*(\d+)/i,
  /case[:\s]+(\d+)/i,
  /processed under reference[:\s]+(\d+)/i,
  /under reference[:\s]+(\d+)/i
];

export const GENERIC_REFERENCE_PATTERN = /\b(\d{6,10})\b/;

export function extractReference(text: string): ExtractedReference | null {
  for (const pattern of LABELED_REFERENCE_PATTERNS) {
    const match = pattern.exec(text);
    if (match?.[1]) {
      return { value: match[1], source: "labeled", pattern: pattern.source };
    }
  }

  const generic = GENERIC_REFERENCE_PATTERN.exec(text);
  if (generic?.[1]) {
    return { value: generic[1], source: "generic", pattern: GENERIC_REFERENCE_PATTERN.source };
  }

  return null;
}
