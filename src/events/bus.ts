import { consoleLogger, describeError, type Logger } from '../logger.js';

export type EventHandler<T> = (event: T) => Promise<void> | void;

export interface PublishResult {
  delivered: number;
  failed: number;
}

interface RegisteredHandler<T> {
  name: string;
  handler: EventHandler<T>;
}

type Registry<Events> = { [K in keyof Events]?: Array<RegisteredHandler<Events[K]>> };

/**
 * In-process publish/subscribe registry. Handlers for a type run in registration
 * order and `publish` resolves once every one of them has finished. A throwing
 * handler is logged and counted as failed; the remaining handlers still run.
 */
export class EventBus<Events> {
  private registry: Registry<Events> = {};
  private sequence = 0;

  constructor(private readonly logger: Logger = consoleLogger) {}

  subscribe<K extends keyof Events>(
    type: K,
    handler: EventHandler<Events[K]>,
    options: { name?: string } = {}
  ): () => void {
    this.sequence += 1;
    const entry: RegisteredHandler<Events[K]> = {
      name: options.name ?? `${String(type)}#${this.sequence}`,
      handler,
    };
    const handlers: Array<RegisteredHandler<Events[K]>> = this.registry[type] ?? [];
    handlers.push(entry);
    this.registry[type] = handlers;

    return () => {
      const current = this.registry[type];
      if (!current) return;
      const index = current.indexOf(entry);
      if (index >= 0) current.splice(index, 1);
    };
  }

  async publish<K extends keyof Events>(type: K, event: Events[K]): Promise<PublishResult> {
    const handlers = [...(this.registry[type] ?? [])];
    const result: PublishResult = { delivered: 0, failed: 0 };

    for (const { name, handler } of handlers) {
      try {
        await handler(event);
        result.delivered += 1;
      } catch (err) {
        result.failed += 1;
        this.logger.error('event_handler_failed', {
          eventType: String(type),
          handler: name,
          error: describeError(err),
        });
      }
    }

    return result;
  }

  handlerCount(type: keyof Events) {
    return this.registry[type]?.length ?? 0;
  }

  clear() {
    this.registry = {};
  }
}
