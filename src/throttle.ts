/**
 * Resource Throttle
 *
 * Samples this process's CPU and memory use once per generation and halves
 * the shared batch size when either crosses its threshold. The throttle stays
 * engaged until both fall back below, so one overload episode halves once.
 */

import { totalmem } from 'os';
import { setTimeout as sleep } from 'timers/promises';
import { errorMessage } from './errors.js';
import { EventSink } from './events.js';
import { Logger, silentLogger } from './logger.js';
import { RuntimeSettings } from './types.js';

export interface ResourceSample {
  cpuPct: number;
  memPct: number;
}

/**
 * A sample as the throttle saw it, with the sticky throttled flag after
 * the hysteresis policy ran
 */
export interface ThrottleReading extends ResourceSample {
  throttled: boolean;
}

export interface ResourceSampler {
  sample(windowMs: number): Promise<ResourceSample>;
}

export type ThrottleDecision =
  | { status: 'skipped'; reason: string }
  | { status: 'throttled'; sample: ThrottleReading; batchSize: number }
  | { status: 'engaged'; sample: ThrottleReading }
  | { status: 'released'; sample: ThrottleReading }
  | { status: 'normal'; sample: ThrottleReading };

/**
 * CPU time consumed over a real-time window, as a percentage of one core,
 * and resident set size as a percentage of system memory
 */
export class ProcessResourceSampler implements ResourceSampler {
  async sample(windowMs: number): Promise<ResourceSample> {
    const startUsage = process.cpuUsage();
    const startTime = process.hrtime.bigint();
    await sleep(windowMs);
    const usage = process.cpuUsage(startUsage);
    const elapsedMicros = Number(process.hrtime.bigint() - startTime) / 1000;

    const cpuPct = elapsedMicros > 0 ? ((usage.user + usage.system) / elapsedMicros) * 100 : 0;
    const memPct = (process.memoryUsage().rss / totalmem()) * 100;
    return { cpuPct, memPct };
  }
}

export interface ResourceThrottleOptions {
  sampler?: ResourceSampler;
  cpuThreshold?: number;
  memoryThreshold?: number;
  windowMs?: number;
  events?: EventSink;
  logger?: Logger;
}

export class ResourceThrottle {
  private engaged = false;
  private readonly sampler: ResourceSampler;
  private readonly cpuThreshold: number;
  private readonly memoryThreshold: number;
  private readonly windowMs: number;
  private readonly events: EventSink | null;
  private readonly logger: Logger;

  constructor(
    private readonly settings: RuntimeSettings,
    options: ResourceThrottleOptions = {}
  ) {
    this.sampler = options.sampler ?? new ProcessResourceSampler();
    this.cpuThreshold = options.cpuThreshold ?? 80;
    this.memoryThreshold = options.memoryThreshold ?? 80;
    this.windowMs = options.windowMs ?? 1000;
    this.events = options.events ?? null;
    this.logger = options.logger ?? silentLogger;
  }

  isEngaged(): boolean {
    return this.engaged;
  }

  /**
   * Sample once and apply the hysteresis policy
   */
  async check(generation: number): Promise<ThrottleDecision> {
    let sample: ResourceSample;
    try {
      sample = await this.sampler.sample(this.windowMs);
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.warn(`Resource sampling failed, skipping throttle check: ${reason}`);
      return { status: 'skipped', reason };
    }

    const overloaded =
      sample.cpuPct > this.cpuThreshold || sample.memPct > this.memoryThreshold;
    const relieved =
      sample.cpuPct < this.cpuThreshold && sample.memPct < this.memoryThreshold;

    if (overloaded && !this.engaged) {
      this.settings.batchSize = Math.max(1, Math.floor(this.settings.batchSize / 2));
      this.engaged = true;
      this.logger.warn(
        `Resource pressure (cpu ${sample.cpuPct.toFixed(1)}%, mem ${sample.memPct.toFixed(1)}%): ` +
          `batch size -> ${this.settings.batchSize}`
      );
      this.events?.emit({
        type: 'resource_throttled',
        generation,
        cpuPct: sample.cpuPct,
        memPct: sample.memPct,
        newBatchSize: this.settings.batchSize,
      });
      return {
        status: 'throttled',
        sample: { ...sample, throttled: true },
        batchSize: this.settings.batchSize,
      };
    }

    if (this.engaged && relieved) {
      this.engaged = false;
      this.logger.info('Resource pressure subsided, throttle released');
      return { status: 'released', sample: { ...sample, throttled: false } };
    }

    const reading = { ...sample, throttled: this.engaged };
    return this.engaged
      ? { status: 'engaged', sample: reading }
      : { status: 'normal', sample: reading };
  }
}
