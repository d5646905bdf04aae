/**
 * Append-only trail of committed ledger events. Engines append only after a state
 * change has been committed, so every entry corresponds to exactly one transition.
 */

import type { LedgerEvent, LedgerEventName } from "../types/ledger-events.js";

export type LedgerEventListener = (event: LedgerEvent) => void;

export interface AuditQuery {
  type?: LedgerEventName;
  round?: number;
  limit?: number;
}

export class AuditLog {
  private readonly events: LedgerEvent[] = [];
  private readonly listeners = new Set<LedgerEventListener>();

  constructor(
    private readonly onListenerError: (err: unknown, event: LedgerEvent) => void = (err) =>
      console.error("Audit listener failed:", err)
  ) {}

  append(event: LedgerEvent): void {
    this.events.push(event);
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.onListenerError(err, event);
      }
    }
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: LedgerEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get size(): number {
    return this.events.length;
  }

  /** Most recent last. `limit` keeps the newest entries. */
  list(query: AuditQuery = {}): LedgerEvent[] {
    let out = this.events.filter((e) => {
      if (query.type !== undefined && e.type !== query.type) return false;
      if (query.round !== undefined && (!("round" in e) || e.round !== query.round)) return false;
      return true;
    });
    if (query.limit !== undefined && out.length > query.limit) {
      out = out.slice(out.length - query.limit);
    }
    return out;
  }
}
