import { describe, it, expect, beforeEach } from "@jest/globals";
import { AnalysisRecoveryService } from "../AnalysisRecoveryService";
import { MockLogger } from "../../../../infrastructure/logging/__tests__/MockLogger";

describe("AnalysisRecoveryService", () => {
  let service: AnalysisRecoveryService;
  let logger: MockLogger;

  beforeEach(() => {
    logger = new MockLogger();
    service = new AnalysisRecoveryService(logger);
  });

  it("should log under a component child logger", () => {
    expect(logger.bindings).toEqual([{ component: "AnalysisRecovery" }]);
  });

  it("should stay quiet at info level for clean output", () => {
    const outcome = service.recover('{"primaryEmotion": "Pride"}');

    expect(outcome.stage).toBe("strict");
    expect(outcome.record.primaryEmotion).toBe("Pride");
    expect(logger.infoCalls).toEqual([]);
  });

  it("should report the tier when output needed recovery", () => {
    const outcome = service.recover('primaryEmotion: "Fear", intensity: 0.7');

    expect(outcome.stage).toBe("partial");
    expect(logger.infoCalls[logger.infoCalls.length - 1]).toEqual({
      message: "Analysis recovered below strict tier",
      context: { stage: "partial" },
    });
  });
});
