/**
 * Controller events
 *
 * Structured notifications for whatever observes the control loop.
 */

import { Logger, consoleLogger } from './logger.js';
import { ResetReason, Score } from './types.js';

export type ControllerEvent =
  | { type: 'drift_detected'; generation: number; featureIndex: number; pValue: number }
  | { type: 'degradation_detected'; generation: number; dropFraction: number }
  | { type: 'population_reset'; generation: number; reason: ResetReason }
  | {
      type: 'resource_throttled';
      generation: number;
      cpuPct: number;
      memPct: number;
      newBatchSize: number;
    }
  | { type: 'generation_completed'; generation: number; bestScore: Score; mutationRate: number };

export type ControllerEventType = ControllerEvent['type'];

export interface EventSink {
  emit(event: ControllerEvent): void;
}

/**
 * Writes each event as a single log line
 */
export class ConsoleEventSink implements EventSink {
  constructor(private readonly logger: Logger = consoleLogger) {}

  emit(event: ControllerEvent): void {
    const { type, ...fields } = event;
    const details = Object.entries(fields)
      .map(([key, value]) => `${key}=${formatValue(value)}`)
      .join(' ');
    this.logger.info(`[${type}] ${details}`);
  }
}

/**
 * Keeps events in memory, in emission order
 */
export class RecordingEventSink implements EventSink {
  readonly events: ControllerEvent[] = [];

  emit(event: ControllerEvent): void {
    this.events.push(event);
  }

  ofType<T extends ControllerEventType>(type: T): Extract<ControllerEvent, { type: T }>[] {
    return this.events.filter(
      (event): event is Extract<ControllerEvent, { type: T }> => event.type === type
    );
  }
}

function formatValue(value: unknown): string {
  if (typeof value === 'number' && !Number.isInteger(value)) {
    return value.toFixed(4);
  }
  return String(value);
}
