import { ResponseLog } from "../entities/ResponseLog";

/**
 * ResponseLog Repository Interface
 *
 * Implementations: Supabase for deployments, in-memory for tests and the
 * `memory` storage driver.
 */
export interface IResponseLogRepository {
  save(log: ResponseLog): Promise<void>;

  findById(id: string): Promise<ResponseLog | null>;

  /**
   * Persist feedback changes to an existing log
   */
  update(log: ResponseLog): Promise<void>;
}
