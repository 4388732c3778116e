import { v7 as uuidv7 } from "uuid";
import type {
  EventBus,
  HelpdeskEvent,
  EventFilter,
  EventHandler,
  Subscription,
  EventTopic,
  TraceContext,
  EventId,
  SessionId,
  SpanId,
  TraceId,
} from "@helpdesk/types";
import type { Logger } from "pino";

/**
 * In-memory implementation of the Helpdesk Event Bus.
 *
 * `publish` waits for async handlers to settle. A throwing handler is logged
 * and never fails the publisher.
 */
export class InMemoryEventBus implements EventBus {
  private subscribers = new Set<{
    filter: EventFilter;
    handler: EventHandler;
    id: string;
  }>();

  constructor(private readonly log?: Logger) {}

  async publish<T>(event: HelpdeskEvent<T>): Promise<void> {
    const promises: Promise<void>[] = [];

    for (const sub of this.subscribers) {
      if (this.matches(event, sub.filter)) {
        try {
          const result = sub.handler(event);
          if (result instanceof Promise) {
            promises.push(result);
          }
        } catch (err) {
          this.log?.error({ err, topic: event.topic }, "event handler failed");
        }
      }
    }

    const settled = await Promise.allSettled(promises);
    for (const outcome of settled) {
      if (outcome.status === "rejected") {
        this.log?.error({ err: outcome.reason, topic: event.topic }, "event handler failed");
      }
    }
  }

  subscribe(filter: EventFilter, handler: EventHandler): Subscription {
    const id = uuidv7();
    const sub = { filter, handler, id };
    this.subscribers.add(sub);

    return {
      id,
      unsubscribe: () => {
        this.subscribers.delete(sub);
      },
    };
  }

  private matches(event: HelpdeskEvent, filter: EventFilter): boolean {
    if (filter.topics && filter.topics.length > 0 && !filter.topics.includes(event.topic)) {
      return false;
    }
    if (filter.sessionId && event.sessionId !== filter.sessionId) {
      return false;
    }
    if (filter.node && event.node !== filter.node) {
      return false;
    }
    if (filter.predicate && !filter.predicate(event)) {
      return false;
    }
    return true;
  }
}

/**
 * Helper to create a new event with a fresh ID and timestamp.
 */
export function createEvent<T>(
  topic: EventTopic,
  payload: T,
  traceCtx: TraceContext,
  scope: { sessionId?: SessionId; node?: string } = {}
): HelpdeskEvent<T> {
  return {
    id: uuidv7() as EventId,
    topic,
    payload,
    traceCtx,
    timestamp: new Date().toISOString(),
    sessionId: scope.sessionId,
    node: scope.node,
  };
}

/**
 * Helper to create a root trace context, or a child span of `parent`.
 */
export function createTraceContext(parent?: TraceContext): TraceContext {
  if (parent) {
    return {
      traceId: parent.traceId,
      spanId: uuidv7() as SpanId,
      parentSpanId: parent.spanId,
    };
  }
  return {
    traceId: uuidv7() as TraceId,
    spanId: uuidv7() as SpanId,
  };
}
