import { describe, expect, it } from "vitest";
import { closeInOrder } from "../src/playwright-session.js";

describe("closeInOrder", () => {
  it("closes the context before the browser", async () => {
    const closed: string[] = [];

    await closeInOrder(
      {
        close: async () => {
          closed.push("context");
        }
      },
      {
        close: async () => {
          closed.push("browser");
        }
      }
    );

    expect(closed).toEqual(["context", "browser"]);
  });

  it("still closes the browser when the context fails to close", async () => {
    const closed: string[] = [];

    await expect(
      closeInOrder(
        {
          close: async () => {
            throw new Error("Target page, context or browser has been closed");
          }
        },
        {
          close: async () => {
            closed.push("browser");
          }
        }
      )
    ).rejects.toThrow("Target page, context or browser has been closed");
    expect(closed).toEqual(["browser"]);
  });

  it("accepts a session that never opened", async () => {
    await expect(closeInOrder(null, null)).resolves.toBeUndefined();
  });
});
