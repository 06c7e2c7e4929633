import type { ExecutorEvent } from "@flashpair/common";

import type { Checkpointable } from "./atomic.js";

/** Notification records; entries added by work that rolls back disappear with it. */
export class EventJournal implements Checkpointable {
  private entries: ExecutorEvent[] = [];

  emit(event: ExecutorEvent): void {
    this.entries.push(event);
  }

  records(): readonly ExecutorEvent[] {
    return [...this.entries];
  }

  /** Hands committed records to a consumer and forgets them. */
  drain(): ExecutorEvent[] {
    const out = this.entries;
    this.entries = [];
    return out;
  }

  checkpoint(): () => void {
    const saved = [...this.entries];
    return () => {
      this.entries = saved;
    };
  }
}
