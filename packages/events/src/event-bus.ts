type EventHandler<TEvent> = (event: TEvent) => void;

export interface EventBusOptions<TEvent> {
  /**
   * Pending events kept before the oldest is dropped.
   * Default: unbounded, so every emitted event is delivered
   */
  maxQueueSize?: number | undefined;

  /**
   * Receives listener failures. Listener errors never reach the emitter.
   */
  onError: (err: unknown) => void;

  /**
   * Receives each event dropped from a full queue.
   * Without it, drops are reported through `onError`.
   */
  onDrop?: ((event: TEvent) => void) | undefined;
}

/**
 * Ordered, asynchronous event bus.
 *
 * `emit` only enqueues; delivery happens on a microtask, in emission order.
 * A ledger request therefore finishes committing before any subscriber runs,
 * and a subscriber that submits a new request does so after the current one.
 */
export class EventBus<TEvent extends { type: string }> {
  private handlers: EventHandler<TEvent>[] = [];
  private pending: TEvent[] = [];
  private drainScheduled = false;
  private readonly maxQueueSize: number;
  private readonly onError: (err: unknown) => void;
  private readonly onDrop: ((event: TEvent) => void) | undefined;

  constructor(options: EventBusOptions<TEvent>) {
    this.maxQueueSize = options.maxQueueSize ?? Number.POSITIVE_INFINITY;
    this.onError = options.onError;
    this.onDrop = options.onDrop;
  }

  subscribe(handler: EventHandler<TEvent>): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((candidate) => candidate !== handler);
    };
  }

  /**
   * Subscribe to a single event type; the handler receives the narrowed event.
   */
  on<TType extends TEvent['type']>(type: TType, handler: EventHandler<Extract<TEvent, { type: TType }>>): () => void {
    return this.subscribe((event) => {
      if (isOfType(event, type)) {
        handler(event);
      }
    });
  }

  emit(event: TEvent): void {
    this.pending.push(event);
    while (this.pending.length > this.maxQueueSize) {
      const dropped = this.pending.shift();
      if (dropped !== undefined) {
        this.reportDrop(dropped);
      }
    }

    if (!this.drainScheduled) {
      this.drainScheduled = true;
      queueMicrotask(() => this.drain());
    }
  }

  private drain(): void {
    this.drainScheduled = false;
    // Events a handler emits go into a fresh batch with its own microtask
    const batch = this.pending;
    this.pending = [];
    for (const event of batch) {
      this.deliver(event);
    }
  }

  private deliver(event: TEvent): void {
    // unsubscribing replaces the array, so this loop keeps the handlers it started with
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (err) {
        this.onError(err);
      }
    }
  }

  private reportDrop(event: TEvent): void {
    if (this.onDrop) {
      this.onDrop(event);
      return;
    }
    this.onError(new Error(`Event queue full (${this.maxQueueSize}); dropped ${event.type}`));
  }
}

function isOfType<TEvent extends { type: string }, TType extends TEvent['type']>(
  event: TEvent,
  type: TType
): event is Extract<TEvent, { type: TType }> {
  return event.type === type;
}
