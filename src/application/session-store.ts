import type { SessionStore, StoredSession } from "../domain/ports.js";
import type { AnalysisSession } from "../domain/types.js";

export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, StoredSession>();

  create(session: AnalysisSession): StoredSession {
    const id = `session_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
    const stored: StoredSession = { id, createdAt: new Date().toISOString(), session };
    this.sessions.set(id, stored);
    return stored;
  }

  get(id: string): StoredSession | undefined {
    return this.sessions.get(id);
  }

  getAll(): StoredSession[] {
    return Array.from(this.sessions.values());
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }
}
