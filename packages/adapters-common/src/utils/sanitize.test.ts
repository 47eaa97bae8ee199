import { describe, it, expect } from "vitest";
import { sanitizeLabels } from "./sanitize";

describe("sanitizeLabels", () => {
  it("lowercases keys and values and replaces invalid characters", () => {
    expect(sanitizeLabels({ "Managed-By": "GpuFleet", team: "ML Platform" })).toEqual({
      "managed-by": "gpufleet",
      team: "ml_platform",
    });
  });

  it("drops keys that do not start with a letter", () => {
    expect(sanitizeLabels({ "1st": "x", ok: "y" })).toEqual({ ok: "y" });
  });
});
