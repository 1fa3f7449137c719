/**
 * Per-session short-term conversation memory.
 *
 * Each session owns one SessionContext; the store hands them out by
 * session id and evicts sessions idle for longer than the TTL. Nothing
 * here is shared between sessions.
 */

export interface HistoryMessage {
  role: 'user' | 'assistant';
  content: string;
}

function speaker(role: HistoryMessage['role']): string {
  return role === 'user' ? 'User' : 'Assistant';
}

export interface ChatWindowOptions {
  /** Most recent messages sent as they are. */
  verbatim?: number;
  /** Character budget shared by the summary of everything older. */
  summaryChars?: number;
}

/**
 * Message list for a chat completion: `history` followed by `message`.
 * Messages older than the verbatim window collapse into one bracketed
 * summary. The list starts with a user message and roles alternate;
 * consecutive messages from the same role are joined.
 */
export function toChatMessages(
  history: HistoryMessage[],
  message: string,
  options: ChatWindowOptions = {}
): HistoryMessage[] {
  const verbatim = options.verbatim ?? 4;
  const summaryChars = options.summaryChars ?? 200;
  const cut = Math.max(0, history.length - verbatim);
  const older = history.slice(0, cut);

  const messages: HistoryMessage[] = [];
  if (older.length > 0) {
    const perMessage = Math.max(1, Math.floor(summaryChars / older.length));
    const summary = older
      .map((m) => `${speaker(m.role)}: ${m.content.replace(/\s+/g, ' ').trim().slice(0, perMessage)}`)
      .join(' | ');
    messages.push({ role: 'user', content: `[Earlier in this session: ${summary}]` });
  }

  const pending: HistoryMessage[] = [...history.slice(cut), { role: 'user', content: message }];
  for (const next of pending) {
    const last = messages[messages.length - 1];
    if (!last) {
      if (next.role === 'user') messages.push(next);
    } else if (last.role === next.role) {
      messages[messages.length - 1] = { role: last.role, content: `${last.content}\n\n${next.content}` };
    } else {
      messages.push(next);
    }
  }
  return messages;
}

export interface ConversationContext {
  /** Last `exchanges` user/assistant pairs as "User: …" / "Assistant: …" lines, most recent last. */
  getRecent(exchanges: number): string;
  getMessages(): HistoryMessage[];
  append(requestText: string, responseText: string): void;
  clear(): void;
}

export class SessionContext implements ConversationContext {
  private messages: HistoryMessage[] = [];

  constructor(private maxMessages: number = 50) {}

  getRecent(exchanges: number): string {
    if (exchanges <= 0) return '';
    return this.messages
      .slice(-exchanges * 2)
      .map((m) => `${speaker(m.role)}: ${m.content}`)
      .join('\n');
  }

  getMessages(): HistoryMessage[] {
    return [...this.messages];
  }

  append(requestText: string, responseText: string): void {
    this.messages.push({ role: 'user', content: requestText }, { role: 'assistant', content: responseText });
    if (this.messages.length > this.maxMessages) {
      this.messages = this.messages.slice(this.messages.length - this.maxMessages);
    }
  }

  clear(): void {
    this.messages = [];
  }
}

export interface SessionContextStoreOptions {
  maxMessages?: number;
  ttlHours?: number;
  now?: () => number;
}

interface Entry {
  context: SessionContext;
  lastUsedAt: number;
}

export class SessionContextStore {
  private sessions = new Map<string, Entry>();
  private maxMessages: number;
  private ttlMs: number;
  private now: () => number;

  constructor(options: SessionContextStoreOptions = {}) {
    this.maxMessages = options.maxMessages ?? 50;
    this.ttlMs = (options.ttlHours ?? 24) * 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Context for a session, created on first use. Expired sessions start over.
   */
  get(sessionId: string): ConversationContext {
    const now = this.now();
    const existing = this.sessions.get(sessionId);
    if (existing && now - existing.lastUsedAt <= this.ttlMs) {
      existing.lastUsedAt = now;
      return existing.context;
    }

    const context = new SessionContext(this.maxMessages);
    this.sessions.set(sessionId, { context, lastUsedAt: now });
    return context;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  clear(sessionId: string): boolean {
    const entry = this.sessions.get(sessionId);
    if (!entry) return false;
    entry.context.clear();
    return true;
  }

  evictExpired(): number {
    const now = this.now();
    let evicted = 0;
    for (const [sessionId, entry] of this.sessions) {
      if (now - entry.lastUsedAt > this.ttlMs) {
        this.sessions.delete(sessionId);
        evicted++;
      }
    }
    return evicted;
  }

  get size(): number {
    return this.sessions.size;
  }
}
