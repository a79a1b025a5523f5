import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { describeError } from '../errors/client.errors';
import { LifecycleEvent, LifecycleEvents, lifecycleEventName } from './lifecycle.events';

/**
 * Typed front for the lifecycle notifications published on `EventEmitter2`.
 *
 * Notifications are advisory: a throwing listener is logged and never
 * reaches the code that emitted the event.
 */
@Injectable()
export class LifecycleService {
  private readonly logger = new Logger(LifecycleService.name);

  constructor(private readonly events: EventEmitter2) {}

  emit<E extends LifecycleEvent>(event: E, ...args: LifecycleEvents[E]): void {
    try {
      this.events.emit(lifecycleEventName(event), ...args);
    } catch (err) {
      this.logger.error(`Listener for ${event} threw: ${describeError(err)}`);
    }
  }

  /** Register a listener; returns a function that removes it. */
  on<E extends LifecycleEvent>(event: E, handler: (...args: LifecycleEvents[E]) => void): () => void {
    const name = lifecycleEventName(event);
    const listener = (...args: LifecycleEvents[E]) => {
      try {
        handler(...args);
      } catch (err) {
        this.logger.error(`Listener for ${event} threw: ${describeError(err)}`);
      }
    };
    this.events.on(name, listener);
    return () => {
      this.events.off(name, listener);
    };
  }
}
