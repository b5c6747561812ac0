import { injectable, inject } from "tsyringe";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { IResponseLogRepository } from "../../../domain/comparisons/repositories/IResponseLogRepository";
import { ResponseLogJSON } from "../../../domain/comparisons/entities/ResponseLog";
import { EntityNotFoundError } from "../../../shared/errors/DomainError";
import { TYPES } from "../../../di/types";

@injectable()
export class GetResponseLogUseCase
  implements IUseCase<string, ResponseLogJSON>
{
  constructor(
    @inject(TYPES.ResponseLogRepository)
    private responseLogRepository: IResponseLogRepository,
  ) {}

  async execute(id: string): Promise<ResponseLogJSON> {
    const log = await this.responseLogRepository.findById(id);

    if (!log) {
      throw new EntityNotFoundError("ResponseLog", id);
    }

    return log.toJSON();
  }
}
