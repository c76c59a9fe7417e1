// Session store: in-memory conversation history for follow-up questions.
// The controller only ever sees the rendered summary string.

export interface Exchange {
  question: string;
  answer: string;
}

export interface HistoryProvider {
  getHistorySummary(sessionId: string): string | undefined;
}

export class SessionStore implements HistoryProvider {
  private sessions = new Map<string, Exchange[]>();
  private counter = 0;

  /** @param maxHistory number of most recent exchanges kept per session */
  constructor(private maxHistory = 2) {}

  createSession(): string {
    this.counter++;
    const id = `session_${this.counter}`;
    this.sessions.set(id, []);
    return id;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  addExchange(sessionId: string, question: string, answer: string): void {
    const history = this.sessions.get(sessionId) ?? [];
    history.push({ question, answer });
    this.sessions.set(sessionId, this.maxHistory > 0 ? history.slice(-this.maxHistory) : []);
  }

  getHistorySummary(sessionId: string): string | undefined {
    const history = this.sessions.get(sessionId);
    if (!history || history.length === 0) return undefined;

    return history
      .map((e) => `User: ${e.question}\nAssistant: ${e.answer}`)
      .join("\n");
  }
}
