import type { ObservabilityEvent, ObservabilitySink } from '../contracts/observability';
import type { Logger } from '../logger';

/** Used when no event bus is configured; events land in the process log only. */
export class LogEventSink implements ObservabilitySink {
  constructor(private readonly log: Logger) {}

  emit(event: ObservabilityEvent): void {
    this.log.debug({ event }, 'Observability event');
  }
}
