import { describe, expect, it } from "vitest";
import { appLogger } from "./logger.js";

describe("appLogger", () => {
  it("builds the application logger once", () => {
    const first = appLogger("silent");
    expect(appLogger("debug")).toBe(first);
  });
});
