import { randomUUID } from "crypto";
import { ConversationStore } from "./conversationService";

export interface SessionContext {
  readonly id: string;
  readonly conversation: ConversationStore;
  readonly createdAt: number;
  lastSeenAt: number;
}

/**
 * Per-browser session state. Sessions are created on first contact and
 * disposed when ended explicitly, when idle past the TTL, or on shutdown.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, SessionContext>();

  constructor(
    private readonly idleTtlMs: number,
    private readonly clock: () => number = Date.now,
  ) {}

  /**
   * Get the live session for an id, or create a new one
   * @param sessionId - The id the browser presented, if any
   * @returns The session and whether it was just created
   */
  open(sessionId?: string): { session: SessionContext; created: boolean } {
    const now = this.clock();
    this.pruneIdle(now);

    const existing = sessionId ? this.sessions.get(sessionId) : undefined;
    if (existing) {
      existing.lastSeenAt = now;
      return { session: existing, created: false };
    }

    const session: SessionContext = {
      id: randomUUID(),
      conversation: new ConversationStore(),
      createdAt: now,
      lastSeenAt: now,
    };
    this.sessions.set(session.id, session);
    return { session, created: true };
  }

  get(sessionId: string): SessionContext | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Dispose a session and its conversation
   * @param sessionId - The session's ID
   * @returns True if the session existed
   */
  end(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    session.conversation.clear();
    return this.sessions.delete(sessionId);
  }

  disposeAll(): void {
    for (const id of [...this.sessions.keys()]) {
      this.end(id);
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  private pruneIdle(now: number): void {
    for (const session of [...this.sessions.values()]) {
      if (now - session.lastSeenAt > this.idleTtlMs) {
        this.end(session.id);
      }
    }
  }
}
