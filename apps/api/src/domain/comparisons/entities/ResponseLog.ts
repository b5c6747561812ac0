import {
  AnalysisPayload,
  AnalysisRecord,
  RecoveryStage,
  toAnalysisPayload,
} from "../../analysis/AnalysisRecord";
import { ValidationError } from "../../../shared/errors/DomainError";

export interface ResponseLogProps {
  id: string;
  createdAt: Date;
  userPrompt: string;
  normalResponse: string;
  analysisRawResponse: string;
  analysis: AnalysisRecord;
  recoveryStage: RecoveryStage;
  userRating: number | null;
  userFeedback: string | null;
}

export interface ResponseLogJSON {
  id: string;
  created_at: string;
  user_prompt: string;
  normal_response: string;
  chs_raw_response: string;
  chs_response: AnalysisPayload;
  recovery_stage: RecoveryStage;
  user_rating: number | null;
  user_feedback: string | null;
}

/**
 * ResponseLog Aggregate Root
 *
 * One prompt, both model answers, the recovered analysis, and whatever
 * feedback the user left afterwards.
 */
export class ResponseLog {
  private constructor(
    public readonly id: string,
    public readonly createdAt: Date,
    public readonly userPrompt: string,
    public readonly normalResponse: string,
    public readonly analysisRawResponse: string,
    public readonly analysis: AnalysisRecord,
    public readonly recoveryStage: RecoveryStage,
    private _userRating: number | null,
    private _userFeedback: string | null,
  ) {}

  static create(
    props: Omit<ResponseLogProps, "createdAt" | "userRating" | "userFeedback">,
  ): ResponseLog {
    return new ResponseLog(
      props.id,
      new Date(),
      props.userPrompt,
      props.normalResponse,
      props.analysisRawResponse,
      props.analysis,
      props.recoveryStage,
      null,
      null,
    );
  }

  /** Rehydrate from storage */
  static restore(props: ResponseLogProps): ResponseLog {
    return new ResponseLog(
      props.id,
      props.createdAt,
      props.userPrompt,
      props.normalResponse,
      props.analysisRawResponse,
      props.analysis,
      props.recoveryStage,
      props.userRating,
      props.userFeedback,
    );
  }

  get userRating(): number | null {
    return this._userRating;
  }

  get userFeedback(): string | null {
    return this._userFeedback;
  }

  get hasFeedback(): boolean {
    return this._userRating !== null;
  }

  /** Later feedback replaces earlier feedback. */
  recordFeedback(rating: number, feedback: string | null = null): void {
    if (!Number.isInteger(rating)) {
      throw new ValidationError("Rating must be an integer", "user_rating");
    }
    this._userRating = rating;
    this._userFeedback = feedback;
  }

  toProps(): ResponseLogProps {
    return {
      id: this.id,
      createdAt: this.createdAt,
      userPrompt: this.userPrompt,
      normalResponse: this.normalResponse,
      analysisRawResponse: this.analysisRawResponse,
      analysis: this.analysis,
      recoveryStage: this.recoveryStage,
      userRating: this._userRating,
      userFeedback: this._userFeedback,
    };
  }

  toJSON(): ResponseLogJSON {
    return {
      id: this.id,
      created_at: this.createdAt.toISOString(),
      user_prompt: this.userPrompt,
      normal_response: this.normalResponse,
      chs_raw_response: this.analysisRawResponse,
      chs_response: toAnalysisPayload(this.analysis),
      recovery_stage: this.recoveryStage,
      user_rating: this._userRating,
      user_feedback: this._userFeedback,
    };
  }
}
