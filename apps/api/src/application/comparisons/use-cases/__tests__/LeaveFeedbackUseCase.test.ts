import { describe, it, expect, beforeEach } from "@jest/globals";
import { LeaveFeedbackUseCase } from "../LeaveFeedbackUseCase";
import { GetResponseLogUseCase } from "../GetResponseLogUseCase";
import { FeedbackDto } from "../../dto/FeedbackDto";
import { ResponseLog } from "../../../../domain/comparisons/entities/ResponseLog";
import { createAnalysisRecord } from "../../../../domain/analysis/AnalysisRecord";
import { InMemoryResponseLogRepository } from "../../../../infrastructure/persistence/in-memory/InMemoryResponseLogRepository";
import { MockLogger } from "../../../../infrastructure/logging/__tests__/MockLogger";
import { EntityNotFoundError } from "../../../../shared/errors/DomainError";

describe("LeaveFeedbackUseCase", () => {
  let useCase: LeaveFeedbackUseCase;
  let getLog: GetResponseLogUseCase;
  let repository: InMemoryResponseLogRepository;
  let logger: MockLogger;

  beforeEach(async () => {
    repository = new InMemoryResponseLogRepository();
    logger = new MockLogger();
    useCase = new LeaveFeedbackUseCase(repository, logger);
    getLog = new GetResponseLogUseCase(repository);

    await repository.save(
      ResponseLog.create({
        id: "log-1",
        userPrompt: "I feel stuck",
        normalResponse: "Try a short walk.",
        analysisRawResponse: "{}",
        analysis: createAnalysisRecord(),
        recoveryStage: "strict",
      }),
    );
  });

  describe("execute", () => {
    it("should record the rating and comment", async () => {
      const result = await useCase.execute(
        new FeedbackDto("log-1", 4, "Felt heard"),
      );

      expect(result).toEqual({ status: "success", log_id: "log-1" });

      const stored = await getLog.execute("log-1");
      expect(stored.user_rating).toBe(4);
      expect(stored.user_feedback).toBe("Felt heard");
    });

    it("should replace earlier feedback", async () => {
      await useCase.execute(new FeedbackDto("log-1", 2, "Too clinical"));
      await useCase.execute(new FeedbackDto("log-1", 5, null));

      const stored = await getLog.execute("log-1");
      expect(stored.user_rating).toBe(5);
      expect(stored.user_feedback).toBeNull();
      expect(logger.infoCalls[1].context).toEqual({
        logId: "log-1",
        rating: 5,
        replacing: true,
      });
    });

    it("should throw EntityNotFoundError for an unknown log", async () => {
      await expect(
        useCase.execute(new FeedbackDto("missing", 3, null)),
      ).rejects.toBeInstanceOf(EntityNotFoundError);
    });
  });
});

describe("GetResponseLogUseCase", () => {
  it("should throw EntityNotFoundError for an unknown log", async () => {
    const useCase = new GetResponseLogUseCase(
      new InMemoryResponseLogRepository(),
    );

    await expect(useCase.execute("missing")).rejects.toThrow(
      "ResponseLog with id missing not found",
    );
  });
});
