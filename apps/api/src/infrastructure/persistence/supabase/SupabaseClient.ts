import {
  createClient,
  SupabaseClient as SupabaseClientType,
} from "@supabase/supabase-js";
import { injectable, inject } from "tsyringe";
import { IConfig } from "../../../shared/config/IConfig";
import { TYPES } from "../../../di/types";

/**
 * Supabase Client Wrapper
 *
 * Created lazily so the `memory` storage driver never needs credentials.
 */
@injectable()
export class SupabaseClient {
  private client: SupabaseClientType | null = null;

  constructor(@inject(TYPES.Config) private readonly config: IConfig) {}

  getClient(): SupabaseClientType {
    if (!this.client) {
      this.client = createClient(
        this.config.supabaseUrl,
        this.config.supabaseAnonKey,
        {
          auth: {
            persistSession: false,
          },
          db: {
            schema: "public",
          },
          global: {
            headers: {
              "X-Client-Info": "affect-api",
            },
          },
        },
      );
    }
    return this.client;
  }
}
