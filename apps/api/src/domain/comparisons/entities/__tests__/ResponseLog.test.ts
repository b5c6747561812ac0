import { describe, it, expect } from "@jest/globals";
import { ResponseLog } from "../ResponseLog";
import { createAnalysisRecord } from "../../../analysis/AnalysisRecord";
import { ValidationError } from "../../../../shared/errors/DomainError";

function createLog(): ResponseLog {
  return ResponseLog.create({
    id: "log-1",
    userPrompt: "I feel stuck",
    normalResponse: "Try a short walk.",
    analysisRawResponse: "{primaryEmotion: 'Guilt'}",
    analysis: createAnalysisRecord({ primaryEmotion: "Guilt" }),
    recoveryStage: "repaired",
  });
}

describe("ResponseLog", () => {
  describe("create", () => {
    it("should start without feedback", () => {
      const log = createLog();

      expect(log.userRating).toBeNull();
      expect(log.userFeedback).toBeNull();
      expect(log.hasFeedback).toBe(false);
    });
  });

  describe("recordFeedback", () => {
    it("should store the rating and comment", () => {
      const log = createLog();

      log.recordFeedback(4, "Felt heard");

      expect(log.userRating).toBe(4);
      expect(log.userFeedback).toBe("Felt heard");
      expect(log.hasFeedback).toBe(true);
    });

    it("should clear the comment when none is given", () => {
      const log = createLog();
      log.recordFeedback(4, "Felt heard");

      log.recordFeedback(2);

      expect(log.userRating).toBe(2);
      expect(log.userFeedback).toBeNull();
    });

    it("should reject a fractional rating", () => {
      const log = createLog();

      expect(() => log.recordFeedback(3.5)).toThrow(ValidationError);
      expect(log.userRating).toBeNull();
    });
  });

  describe("toJSON", () => {
    it("should use wire field names and the nested analysis shape", () => {
      const log = ResponseLog.restore({
        ...createLog().toProps(),
        createdAt: new Date("2024-05-01T12:00:00.000Z"),
        userRating: 5,
      });

      const json = log.toJSON();

      expect(json.created_at).toBe("2024-05-01T12:00:00.000Z");
      expect(json.user_prompt).toBe("I feel stuck");
      expect(json.chs_raw_response).toBe("{primaryEmotion: 'Guilt'}");
      expect(json.chs_response.internal_chs_analysis.primaryEmotion).toBe(
        "Guilt",
      );
      expect(json.chs_response.user_facing_response).toBe("");
      expect(json.recovery_stage).toBe("repaired");
      expect(json.user_rating).toBe(5);
      expect(json.user_feedback).toBeNull();
    });
  });
});
