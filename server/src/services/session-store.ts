import { randomUUID } from "node:crypto";
import { SessionNotFoundError } from "./errors";
import type { Ledger } from "./ledger";
import { logger } from "../utils/logger";

export interface Session {
  id: string;
  createdAt: Date;
  lastAccessedAt: Date;
  ledger: Ledger;
}

export interface SessionStoreOptions {
  ttlMs: number;
  now?: () => Date;
}

/**
 * Holds the ledger of every open browser session. Sessions idle for longer
 * than the TTL are dropped the next time the store is accessed.
 */
export class SessionStore {
  #sessions = new Map<string, Session>();
  #ttlMs: number;
  #now: () => Date;

  constructor(options: SessionStoreOptions) {
    this.#ttlMs = options.ttlMs;
    this.#now = options.now ?? (() => new Date());
  }

  get size(): number {
    this.#sweep();
    return this.#sessions.size;
  }

  create(): Session {
    this.#sweep();
    const now = this.#now();
    const session: Session = {
      id: randomUUID(),
      createdAt: now,
      lastAccessedAt: now,
      ledger: [],
    };
    this.#sessions.set(session.id, session);
    logger.debug("Session created", { sessionId: session.id });
    return session;
  }

  get(sessionId: string): Session {
    this.#sweep();
    const session = this.#sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    session.lastAccessedAt = this.#now();
    return session;
  }

  update(sessionId: string, ledger: Ledger): Session {
    const session = this.get(sessionId);
    session.ledger = ledger;
    return session;
  }

  discard(sessionId: string): void {
    if (!this.#sessions.delete(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }
    logger.debug("Session discarded", { sessionId });
  }

  #sweep() {
    const cutoff = this.#now().getTime() - this.#ttlMs;
    for (const [id, session] of this.#sessions) {
      if (session.lastAccessedAt.getTime() < cutoff) {
        this.#sessions.delete(id);
        logger.info("Session expired", { sessionId: id });
      }
    }
  }
}
