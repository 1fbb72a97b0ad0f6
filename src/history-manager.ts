/**
 * Subject Tutor: Conversation History
 *
 * In-memory, per session. Sessions past `max_sessions` are evicted oldest
 * first (by last activity); each session keeps its newest
 * `max_entries_per_session` entries.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { HistoryEntry, QueryResponse } from "./types.js";
import { now } from "./utils.js";

export interface HistoryLimits {
  max_entries_per_session: number;
  max_sessions: number;
}

export class HistoryManager {
  /** Map order doubles as last-activity order */
  private readonly sessions = new Map<string, HistoryEntry[]>();

  constructor(private readonly limits: HistoryLimits) {}

  addEntry(sessionId: string, question: string, response: QueryResponse): HistoryEntry {
    const entries = this.sessions.get(sessionId) ?? [];
    const entry: HistoryEntry = { question, response, timestamp: now() };
    entries.push(entry);
    if (entries.length > this.limits.max_entries_per_session) {
      entries.splice(0, entries.length - this.limits.max_entries_per_session);
    }

    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, entries);
    this.evict();
    return entry;
  }

  /**
   * Entries oldest first; `limit` keeps only the newest ones
   */
  getHistory(sessionId: string, limit?: number): HistoryEntry[] {
    const entries = this.sessions.get(sessionId) ?? [];
    if (limit === undefined) return [...entries];
    return limit <= 0 ? [] : entries.slice(-limit);
  }

  /**
   * Recent turns rendered for a prompt, or "" when the session is new
   */
  getContext(sessionId: string, limit: number = 3): string {
    const recent = this.getHistory(sessionId, limit);
    if (recent.length === 0) return "";

    let context = "Recent conversation context:\n";
    for (const entry of recent) {
      context += `Previous Q: ${entry.question}\n`;
      context += `Previous A: ${entry.response.response.answer}\n`;
    }
    return context;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /** Returns the number of entries removed */
  clearSession(sessionId: string): number {
    const removed = this.sessions.get(sessionId)?.length ?? 0;
    this.sessions.delete(sessionId);
    return removed;
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  getTotalEntries(): number {
    let total = 0;
    for (const entries of this.sessions.values()) {
      total += entries.length;
    }
    return total;
  }

  private evict(): void {
    while (this.sessions.size > this.limits.max_sessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }
  }
}
