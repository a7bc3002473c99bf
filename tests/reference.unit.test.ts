import { describe, expect, it } from "vitest";
import { extractReference } from "../src/reference.js";

describe("extractReference", () => {
  it("reads a labelled reference", () => {
    expect(extractReference("Your request has been processed under reference 4455667.")).toEqual({
      value: "4455667",
      source: "labeled",
      pattern: "reference[:\\s]+(\\d+)"
    });
  });

  it("accepts a case number without a separator", () => {
    expect(extractReference("Case number:123456 assigned")?.value).toBe("123456");
  });

  it("prefers a labelled number over an earlier bare digit run", () => {
    const text = "Flight 12345678 on 01/02. Case 4321 opened.";
    expect(extractReference(text)).toEqual({ value: "4321", source: "labeled", pattern: "case[:\\s]+(\\d+)" });
  });

  it("falls back to a standalone run of six to ten digits", () => {
    expect(extractReference("Thanks! 98765432 is your number")).toEqual({
      value: "98765432",
      source: "generic",
      pattern: "\\b(\\d{6,10})\\b"
    });
  });

  it("ignores short and overlong digit runs", () => {
    expect(extractReference("Call 12345 or 12345678901 for help")).toBeNull();
  });

  it("matches labels case-insensitively", () => {
    expect(extractReference("REFERENCE: 700100")?.source).toBe("labeled");
  });
});
