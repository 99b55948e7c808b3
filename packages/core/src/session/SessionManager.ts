export type SessionRole = "user" | "assistant";

export interface SessionMessage {
  role: SessionRole;
  content: string;
}

const ROLE_LABELS: Record<SessionRole, string> = {
  user: "User",
  assistant: "Assistant",
};

/** In-memory conversation log per session, bounded to the last `maxHistory` exchanges. */
export class SessionManager {
  private sessions = new Map<string, SessionMessage[]>();
  private counter = 0;

  constructor(readonly maxHistory = 2) {}

  createSession(): string {
    this.counter += 1;
    const sessionId = `session_${this.counter}`;
    this.sessions.set(sessionId, []);
    return sessionId;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  addMessage(sessionId: string, role: SessionRole, content: string): void {
    const messages = this.sessions.get(sessionId) ?? [];
    messages.push({ role, content });
    const limit = this.maxHistory * 2;
    if (messages.length > limit) {
      messages.splice(0, messages.length - limit);
    }
    this.sessions.set(sessionId, messages);
  }

  addExchange(sessionId: string, userMessage: string, assistantMessage: string): void {
    this.addMessage(sessionId, "user", userMessage);
    this.addMessage(sessionId, "assistant", assistantMessage);
  }

  getConversationHistory(sessionId?: string): string | undefined {
    if (!sessionId) return undefined;
    const messages = this.sessions.get(sessionId);
    if (!messages?.length) return undefined;
    return messages.map((message) => `${ROLE_LABELS[message.role]}: ${message.content}`).join("\n");
  }

  clearSession(sessionId: string): void {
    if (this.sessions.has(sessionId)) {
      this.sessions.set(sessionId, []);
    }
  }
}
