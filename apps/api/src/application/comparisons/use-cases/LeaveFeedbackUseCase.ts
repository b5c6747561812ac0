import { injectable, inject } from "tsyringe";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { FeedbackDto, FeedbackResultDto } from "../dto/FeedbackDto";
import { IResponseLogRepository } from "../../../domain/comparisons/repositories/IResponseLogRepository";
import { EntityNotFoundError } from "../../../shared/errors/DomainError";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { TYPES } from "../../../di/types";

/**
 * Leave Feedback Use Case
 *
 * Attaches a rating and optional comment to a stored comparison.
 */
@injectable()
export class LeaveFeedbackUseCase
  implements IUseCase<FeedbackDto, FeedbackResultDto>
{
  constructor(
    @inject(TYPES.ResponseLogRepository)
    private responseLogRepository: IResponseLogRepository,

    @inject(TYPES.Logger)
    private logger: ILogger,
  ) {}

  async execute(dto: FeedbackDto): Promise<FeedbackResultDto> {
    const log = await this.responseLogRepository.findById(dto.logId);

    if (!log) {
      throw new EntityNotFoundError("ResponseLog", dto.logId);
    }

    const replacing = log.hasFeedback;
    log.recordFeedback(dto.userRating, dto.userFeedback);
    await this.responseLogRepository.update(log);

    this.logger.info("Feedback recorded", {
      logId: log.id,
      rating: dto.userRating,
      replacing,
    });

    return new FeedbackResultDto(log.id);
  }
}
