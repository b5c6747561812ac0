import { Request, Response } from "express";
import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { IConfig } from "../../../shared/config/IConfig";
import { SERVICE_NAME, SERVICE_VERSION } from "../../../shared/config/service";

const KEY_PREFIX_CHARS = 5;

export interface ConfigStatus {
  storage_driver: string;
  database_url_prefix: string;
  llm_model: string;
  llm_key_status: "Loaded" | "Not Loaded";
  llm_key_first_chars: string;
}

/**
 * Configuration summary with secrets masked
 */
export function describeConfig(config: IConfig): ConfigStatus {
  const scheme = config.supabaseUrl.split("://");

  return {
    storage_driver: config.storageDriver,
    database_url_prefix:
      scheme.length > 1 ? `${scheme[0]}://...` : "N/A",
    llm_model: config.llmModel,
    llm_key_status: config.llmApiKey ? "Loaded" : "Not Loaded",
    llm_key_first_chars: config.llmApiKey
      ? `${config.llmApiKey.slice(0, KEY_PREFIX_CHARS)}...`
      : "N/A",
  };
}

@injectable()
export class SystemController {
  constructor(@inject(TYPES.Config) private config: IConfig) {}

  /**
   * GET /health
   */
  health(_req: Request, res: Response): void {
    res.json({ ok: true, service: SERVICE_NAME, version: SERVICE_VERSION });
  }

  /**
   * GET /config-status
   */
  configStatus(_req: Request, res: Response): void {
    res.json(describeConfig(this.config));
  }
}
