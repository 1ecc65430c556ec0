export interface ConversationTurn {
  query: string;
  answer: string;
}

/**
 * Keeps the most recent `maxHistory` exchanges per session, in memory only.
 * A restart drops every session.
 */
export class SessionManager {
  private readonly sessions = new Map<string, ConversationTurn[]>();

  private sessionCounter = 0;

  constructor(private readonly maxHistory: number) {}

  createSession(): string {
    this.sessionCounter += 1;
    const sessionId = `session_${this.sessionCounter}`;
    this.sessions.set(sessionId, []);
    return sessionId;
  }

  addExchange(sessionId: string, query: string, answer: string): void {
    const turns = this.sessions.get(sessionId) ?? [];
    turns.push({ query, answer });

    const excess = turns.length - Math.max(this.maxHistory, 0);
    if (excess > 0) {
      turns.splice(0, excess);
    }
    this.sessions.set(sessionId, turns);
  }

  getTurns(sessionId: string): ConversationTurn[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  getConversationHistory(sessionId: string | null | undefined): string | null {
    if (!sessionId) {
      return null;
    }
    const turns = this.sessions.get(sessionId);
    if (!turns || turns.length === 0) {
      return null;
    }

    return turns.map((turn) => `User: ${turn.query}\nAssistant: ${turn.answer}`).join("\n");
  }

  clearSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }
}
