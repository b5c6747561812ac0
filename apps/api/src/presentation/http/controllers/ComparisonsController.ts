import { Request, Response, NextFunction } from "express";
import { inject, injectable } from "tsyringe";
import { CompareResponsesUseCase } from "../../../application/comparisons/use-cases/CompareResponsesUseCase";
import { LeaveFeedbackUseCase } from "../../../application/comparisons/use-cases/LeaveFeedbackUseCase";
import { GetResponseLogUseCase } from "../../../application/comparisons/use-cases/GetResponseLogUseCase";
import { CompareDto } from "../../../application/comparisons/dto/CompareDto";
import { FeedbackDto } from "../../../application/comparisons/dto/FeedbackDto";
import { TYPES } from "../../../di/types";
import { EntityNotFoundError } from "../../../shared/errors/DomainError";
import {
  LLMTimeoutError,
  LLMUnavailableError,
  LLMRequestError,
} from "../../../shared/errors/LLMError";
import {
  BadGatewayError,
  GatewayTimeoutError,
  NotFoundError,
  ServiceUnavailableError,
} from "../../../shared/errors/HttpError";

/**
 * Comparisons HTTP Controller
 *
 * Handles the compare, feedback and log lookup endpoints
 */
@injectable()
export class ComparisonsController {
  constructor(
    @inject(TYPES.CompareResponsesUseCase)
    private compareResponsesUseCase: CompareResponsesUseCase,
    @inject(TYPES.LeaveFeedbackUseCase)
    private leaveFeedbackUseCase: LeaveFeedbackUseCase,
    @inject(TYPES.GetResponseLogUseCase)
    private getResponseLogUseCase: GetResponseLogUseCase,
  ) {}

  /**
   * POST /compare - Plain and analysed answers to one prompt
   */
  async compare(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const dto = CompareDto.fromRequest(req.body);

      const comparison = await this.compareResponsesUseCase.execute(dto);

      res.status(201).json(comparison);
    } catch (error) {
      if (error instanceof LLMTimeoutError) {
        next(new GatewayTimeoutError(error.message));
      } else if (error instanceof LLMUnavailableError) {
        next(new ServiceUnavailableError(error.message));
      } else if (error instanceof LLMRequestError) {
        next(new BadGatewayError(error.message));
      } else {
        next(error);
      }
    }
  }

  /**
   * POST /feedback - Rate a stored comparison
   */
  async feedback(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const dto = FeedbackDto.fromRequest(req.body);

      const result = await this.leaveFeedbackUseCase.execute(dto);

      res.status(200).json(result);
    } catch (error) {
      if (error instanceof EntityNotFoundError) {
        next(new NotFoundError("Log"));
      } else {
        next(error);
      }
    }
  }

  /**
   * GET /logs/:id - Fetch a stored comparison
   */
  async getLog(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const log = await this.getResponseLogUseCase.execute(req.params.id);

      res.status(200).json(log);
    } catch (error) {
      if (error instanceof EntityNotFoundError) {
        next(new NotFoundError("Log"));
      } else {
        next(error);
      }
    }
  }
}
