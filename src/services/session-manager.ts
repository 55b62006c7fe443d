// Session Manager
// In-memory conversation history per session, trimmed to the last few exchanges

import { env } from '../env.js';
import { TTLCache } from '../utils/ttl-cache.js';

export interface SessionMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface SessionManagerOptions {
  maxHistory?: number; // Exchanges (question + answer) to keep
  ttlMs?: number;
}

export class SessionManager {
  private sessions: TTLCache<string, SessionMessage[]>;
  private maxHistory: number;
  private counter = 0;

  constructor(options: SessionManagerOptions = {}) {
    this.maxHistory = options.maxHistory ?? env.MAX_HISTORY;
    this.sessions = new TTLCache(options.ttlMs ?? env.SESSION_TTL_MS);
  }

  createSession(): string {
    this.counter++;
    const sessionId = `session_${this.counter}`;
    this.sessions.set(sessionId, []);
    return sessionId;
  }

  addMessage(sessionId: string, message: SessionMessage): void {
    const messages = [...(this.sessions.get(sessionId) ?? []), message];
    const limit = this.maxHistory * 2;
    this.sessions.set(sessionId, messages.length > limit ? messages.slice(-limit) : messages);
  }

  addExchange(sessionId: string, query: string, answer: string): void {
    this.addMessage(sessionId, { role: 'user', content: query });
    this.addMessage(sessionId, { role: 'assistant', content: answer });
  }

  /** Formatted prior turns, or null when the session has none. */
  getConversationHistory(sessionId: string): string | null {
    const messages = this.sessions.get(sessionId);
    if (!messages || messages.length === 0) {
      return null;
    }

    return messages
      .map(m => `${m.role === 'user' ? 'User' : 'Assistant'}: ${m.content}`)
      .join('\n');
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  clearSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  destroy(): void {
    this.sessions.destroy();
  }
}
