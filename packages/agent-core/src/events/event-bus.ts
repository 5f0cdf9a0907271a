/**
 * In-process implementation of OrchestratorEventBus.
 *
 * - error isolation: a throwing handler does not break other handlers or the session
 * - max recursion depth 1: emit inside a handler is dropped
 */

import type {
  ILogger,
  OrchestratorEventBus,
  OrchestratorEventName,
  OrchestratorEvents,
  Unsubscribe,
} from '@baton/agent-contracts';
import { errorMessage } from '@baton/agent-contracts';
import { createNoopLogger } from '../logging/logger.js';

type Handler<K extends OrchestratorEventName> = (data: OrchestratorEvents[K]) => void;

type HandlerMap = {
  [K in OrchestratorEventName]?: Set<Handler<K>>;
};

export function createEventBus(options: { logger?: ILogger } = {}): OrchestratorEventBus {
  const logger = options.logger ?? createNoopLogger();
  let handlers: HandlerMap = {};
  let dispatching = false;

  function handlersFor<K extends OrchestratorEventName>(event: K): Set<Handler<K>> {
    const existing: HandlerMap[K] = handlers[event];
    if (existing) {
      return existing;
    }
    const created = new Set<Handler<K>>();
    const byEvent: { [P in K]?: Set<Handler<P>> } = handlers;
    byEvent[event] = created;
    return created;
  }

  return {
    emit<K extends OrchestratorEventName>(event: K, data: OrchestratorEvents[K]): void {
      if (dispatching) {
        logger.debug('Nested event emit dropped', { event });
        return;
      }
      const subscribers: HandlerMap[K] = handlers[event];
      if (!subscribers || subscribers.size === 0) {
        return;
      }
      dispatching = true;
      try {
        for (const handler of Array.from(subscribers)) {
          try {
            handler(data);
          } catch (error) {
            logger.warn('Event handler failed', { event, error: errorMessage(error) });
          }
        }
      } finally {
        dispatching = false;
      }
    },

    on<K extends OrchestratorEventName>(event: K, handler: Handler<K>): Unsubscribe {
      const set = handlersFor(event);
      set.add(handler);
      return () => {
        set.delete(handler);
      };
    },

    clear(): void {
      handlers = {};
    },
  };
}
