import { describe, it, expect } from "vitest";
import { APP_NAME, APP_VERSION, RoiBox, createStabilizer, createRoiStrategy } from "./index.js";

describe("Project setup", () => {
  it("should export app name", () => {
    expect(APP_NAME).toBe("ROI Stabilizer");
  });

  it("should export app version", () => {
    expect(APP_VERSION).toBe("0.1.0");
  });

  it("should re-export the public API", () => {
    expect(typeof RoiBox).toBe("function");
    expect(typeof createStabilizer).toBe("function");
    expect(typeof createRoiStrategy).toBe("function");
  });
});
