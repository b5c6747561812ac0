import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { recoverWithTrace } from "../../../lib/ai/recovery/recoverAnalysis";
import { RecoveryOutcome } from "../../../lib/ai/recovery/types";

/**
 * Turns raw analysis completions into AnalysisRecords.
 *
 * Never fails: the worst case is the default record at the "default" stage.
 */
@injectable()
export class AnalysisRecoveryService {
  private readonly logger: ILogger;

  constructor(@inject(TYPES.Logger) logger: ILogger) {
    this.logger = logger.child({ component: "AnalysisRecovery" });
  }

  recover(rawText: string): RecoveryOutcome {
    const outcome = recoverWithTrace(rawText, { logger: this.logger });

    if (outcome.stage !== "strict") {
      this.logger.info("Analysis recovered below strict tier", {
        stage: outcome.stage,
      });
    }

    return outcome;
  }
}
