import { injectable, inject } from "tsyringe";
import { randomUUID } from "crypto";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { CompareDto, ComparisonDto } from "../dto/CompareDto";
import { IResponseLogRepository } from "../../../domain/comparisons/repositories/IResponseLogRepository";
import { ResponseLog } from "../../../domain/comparisons/entities/ResponseLog";
import { AnalysisRecoveryService } from "../../../domain/analysis/services/AnalysisRecoveryService";
import { toAnalysisPayload } from "../../../domain/analysis/AnalysisRecord";
import { ILLMClient } from "../../../infrastructure/ai/ILLMClient";
import { PromptTemplates } from "../../../infrastructure/ai/PromptTemplates";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { TYPES } from "../../../di/types";

/**
 * Compare Responses Use Case
 *
 * Asks the model the same prompt twice, once plainly and once under the
 * emotion-analysis prompt, recovers the analysis and logs the pair.
 */
@injectable()
export class CompareResponsesUseCase
  implements IUseCase<CompareDto, ComparisonDto>
{
  constructor(
    @inject(TYPES.LLMClient)
    private llmClient: ILLMClient,

    @inject(TYPES.AnalysisRecoveryService)
    private recoveryService: AnalysisRecoveryService,

    @inject(TYPES.ResponseLogRepository)
    private responseLogRepository: IResponseLogRepository,

    @inject(TYPES.Logger)
    private logger: ILogger,
  ) {}

  async execute(dto: CompareDto): Promise<ComparisonDto> {
    const logId = randomUUID();
    this.logger.info("Comparing responses", {
      logId,
      promptLength: dto.prompt.length,
    });

    const [normalResponse, analysisRawResponse] = await Promise.all([
      this.llmClient.complete(dto.prompt),
      this.llmClient.complete(dto.prompt, {
        system: PromptTemplates.emotionAnalysis(),
      }),
    ]);

    const { record, stage } = this.recoveryService.recover(analysisRawResponse);

    const log = ResponseLog.create({
      id: logId,
      userPrompt: dto.prompt,
      normalResponse,
      analysisRawResponse,
      analysis: record,
      recoveryStage: stage,
    });

    await this.responseLogRepository.save(log);

    this.logger.info("Comparison stored", { logId, recoveryStage: stage });

    return new ComparisonDto(
      log.id,
      normalResponse,
      toAnalysisPayload(record),
      stage,
    );
  }
}
