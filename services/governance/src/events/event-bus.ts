/**
 * Governance Event Bus
 *
 * In-process publication of governance event records with a bounded history.
 */

import { EventEmitter } from "eventemitter3";
import { EVENT_HISTORY_LIMIT, governanceLogger } from "@quorum/shared";
import type {
  EventSink,
  GovernanceEvent,
  GovernanceEventOf,
  GovernanceEventType,
} from "./types.js";

const busLogger = governanceLogger.child({ component: "event-bus" });

export interface GovernanceEventBusEvents {
  event: (event: GovernanceEvent) => void;
}

function isEventOfType<K extends GovernanceEventType>(
  event: GovernanceEvent,
  type: K
): event is GovernanceEventOf<K> {
  return event.type === type;
}

// ============================================
// EVENT BUS
// ============================================

export class GovernanceEventBus
  extends EventEmitter<GovernanceEventBusEvents>
  implements EventSink
{
  private readonly history: GovernanceEvent[] = [];
  private readonly historyLimit: number;

  constructor(historyLimit: number = EVENT_HISTORY_LIMIT) {
    super();
    this.historyLimit = historyLimit;
  }

  publish(event: GovernanceEvent): void {
    this.history.push(event);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }

    busLogger.debug({
      type: event.type,
      entityId: event.entityId,
      actor: event.actor,
      timestamp: event.timestamp,
    }, "Governance event published");

    this.emit("event", event);
  }

  /**
   * Subscribe to one event type. Returns an unsubscribe function.
   */
  subscribe<K extends GovernanceEventType>(
    type: K,
    listener: (event: GovernanceEventOf<K>) => void
  ): () => void {
    const handler = (event: GovernanceEvent): void => {
      if (isEventOfType(event, type)) {
        listener(event);
      }
    };
    this.on("event", handler);
    return () => {
      this.off("event", handler);
    };
  }

  getHistory(filter?: { type?: GovernanceEventType; entityId?: string }): GovernanceEvent[] {
    return this.history.filter(
      (event) =>
        (filter?.type === undefined || event.type === filter.type) &&
        (filter?.entityId === undefined || event.entityId === filter.entityId)
    );
  }

  getEventsOfType<K extends GovernanceEventType>(type: K): GovernanceEventOf<K>[] {
    const matches: GovernanceEventOf<K>[] = [];
    for (const event of this.history) {
      if (isEventOfType(event, type)) {
        matches.push(event);
      }
    }
    return matches;
  }

  clearHistory(): void {
    this.history.length = 0;
  }
}

export function createEventBus(historyLimit?: number): GovernanceEventBus {
  return new GovernanceEventBus(historyLimit);
}
