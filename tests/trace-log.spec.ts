import { afterEach, describe, expect, it, vi } from "vitest";
import { traceLog, warnLog } from "../modules/core/trace-log";

describe("trace logging", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("stays silent while ACP_DEBUG_LOG is off", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    traceLog("Evaluate", "evaluation complete", { model: "rescattering-matrix" });
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("always prints warnings with their tag", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    warnLog("Evaluate", "asymmetry outside [-1, 1]", { acp: 1.2 });
    warnLog("Evaluate", "no payload");
    expect(warnSpy).toHaveBeenNthCalledWith(1, "[Evaluate] asymmetry outside [-1, 1]", { acp: 1.2 });
    expect(warnSpy).toHaveBeenNthCalledWith(2, "[Evaluate] no payload");
  });
});
