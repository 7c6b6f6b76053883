import { v4 as uuidv4 } from "uuid";
import type { FilterCriteria } from "../shared/types.js";
import { ValidationError } from "../shared/errors.js";
import { MAX_SESSIONS } from "../shared/config.js";
import { logger } from "../shared/logger.js";
import { defaultCriteria, parseCriteria } from "../analytics/filter.js";

export interface CriteriaUpdate {
  criteria: FilterCriteria;
  accepted: boolean;
  warning?: string;
}

/**
 * Per-session current selection. This is the only mutable state in the
 * app; every view is re-derived from the criteria held here.
 *
 * Holds at most `maxSessions` entries. Map iteration order is insertion
 * order, and every read re-inserts its entry, so the first key is always
 * the least recently used session.
 */
export class SessionStore {
  private readonly sessions = new Map<string, FilterCriteria>();

  constructor(
    private readonly defaultMapPoints: number = 3000,
    private readonly maxSessions: number = MAX_SESSIONS
  ) {
    if (!Number.isInteger(maxSessions) || maxSessions < 1) {
      throw new RangeError(`maxSessions must be a positive integer, got ${maxSessions}`);
    }
  }

  create(): { sessionId: string; criteria: FilterCriteria } {
    const sessionId = uuidv4();
    const criteria = defaultCriteria(this.defaultMapPoints);
    this.evictOverflow(1);
    this.sessions.set(sessionId, criteria);
    logger.debug("session_created", { session_id: sessionId });
    return { sessionId, criteria };
  }

  get(sessionId: string): FilterCriteria | undefined {
    const criteria = this.sessions.get(sessionId);
    if (criteria !== undefined) this.touch(sessionId, criteria);
    return criteria;
  }

  /**
   * Replace the session's criteria. Invalid input leaves the previous
   * criteria in place and comes back with a warning. Unknown sessions
   * return undefined.
   */
  update(sessionId: string, input: unknown): CriteriaUpdate | undefined {
    const current = this.get(sessionId);
    if (current === undefined) return undefined;

    try {
      const criteria = parseCriteria(input, this.defaultMapPoints);
      this.sessions.set(sessionId, criteria);
      return { criteria, accepted: true };
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      return this.reject(sessionId, err);
    }
  }

  /** Record input that never reached parsing (e.g. a malformed body). */
  reject(sessionId: string, err: ValidationError): CriteriaUpdate | undefined {
    const current = this.get(sessionId);
    if (current === undefined) return undefined;

    logger.warn("criteria_rejected", { session_id: sessionId, issues: err.issues });
    return {
      criteria: current,
      accepted: false,
      warning: `Filters not applied: ${err.message}. Showing the previous selection.`,
    };
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  private touch(sessionId: string, criteria: FilterCriteria): void {
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, criteria);
  }

  private evictOverflow(incoming: number): void {
    for (const sessionId of this.sessions.keys()) {
      if (this.sessions.size + incoming <= this.maxSessions) return;
      this.sessions.delete(sessionId);
      logger.debug("session_evicted", { session_id: sessionId });
    }
  }
}
