import { logger as rootLogger, type Logger } from '../logger.js';

export type EventLevel = 'debug' | 'info' | 'warn' | 'error';

export interface MigrationEvent {
  timestamp: Date;
  level: EventLevel;
  jobId?: string;
  message: string;
  fields: Record<string, unknown>;
}

export interface MigrationEventSink {
  emit(event: MigrationEvent): void;
}

/**
 * Forwards migration events to pino, keeping the event's own timestamp
 */
export class LoggerEventSink implements MigrationEventSink {
  constructor(private readonly logger: Logger = rootLogger) {}

  emit(event: MigrationEvent): void {
    const bindings = {
      ...event.fields,
      jobId: event.jobId,
      eventTime: event.timestamp.toISOString()
    };
    this.logger[event.level](bindings, event.message);
  }
}

/**
 * Keeps events in memory (tests, end-of-run reports)
 */
export class MemoryEventSink implements MigrationEventSink {
  readonly events: MigrationEvent[] = [];

  emit(event: MigrationEvent): void {
    this.events.push(event);
  }

  forJob(jobId: string): MigrationEvent[] {
    return this.events.filter(event => event.jobId === jobId);
  }
}
