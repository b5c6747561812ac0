import { IResponseLogRepository } from "../../../domain/comparisons/repositories/IResponseLogRepository";
import {
  ResponseLog,
  ResponseLogProps,
} from "../../../domain/comparisons/entities/ResponseLog";
import { PersistenceError } from "../../../shared/errors/PersistenceError";

/**
 * In-memory implementation of IResponseLogRepository
 *
 * Backs the `memory` storage driver and the tests. Entities are stored as
 * snapshots so later mutation only persists through update().
 */
export class InMemoryResponseLogRepository implements IResponseLogRepository {
  private logs: Map<string, ResponseLogProps> = new Map();

  async save(log: ResponseLog): Promise<void> {
    if (this.logs.has(log.id)) {
      throw new PersistenceError(`ResponseLog ${log.id} already exists`, "save");
    }
    this.logs.set(log.id, log.toProps());
  }

  async findById(id: string): Promise<ResponseLog | null> {
    const props = this.logs.get(id);
    return props ? ResponseLog.restore(props) : null;
  }

  async update(log: ResponseLog): Promise<void> {
    if (!this.logs.has(log.id)) {
      throw new PersistenceError(`ResponseLog ${log.id} not found`, "update");
    }
    this.logs.set(log.id, log.toProps());
  }

  // Test helper methods
  clear(): void {
    this.logs.clear();
  }

  count(): number {
    return this.logs.size;
  }
}
