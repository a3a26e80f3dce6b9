/**
 * Transmission Scheduler
 *
 * Drives the display: waits once for the device to come up, then cycles
 * through the schedule forever, writing one frame and dwelling before the
 * next. Runs on a single logical thread; a frame is built only after the
 * previous one has fully drained.
 *
 *   idle -> warming-up -> running -> stopped
 *
 * A failed write is fatal and never retried. Cancellation through the
 * AbortSignal is checked before each build and around each wait, so an
 * in-flight write always completes.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { ConfigurationError, TransmissionError } from '../errors.js';
import { PLACEHOLDER_TEXT } from '../formatter/fixed-width.js';
import { centerRow, fitRow } from '../formatter/layout.js';
import type { DisplayFrame, FrameKind, ScheduleEntry, WireEncoding } from '../types/index.js';
import type { SerialLink } from '../serial-link/serial-link.js';
import { MAX_SLEEP_MS, systemClock, type SchedulerClock } from './clock.js';
import { encodeFrame } from './frame-encoder.js';

export type SchedulerState = 'idle' | 'warming-up' | 'running' | 'stopped';

export interface TransmissionSchedulerOptions {
  /** One-time pause before the first frame, in milliseconds */
  warmUpMs: number;
  /** Wire encoding of the frame text */
  encoding?: WireEncoding;
  clock?: SchedulerClock;
  /** Stop after this many full cycles; runs until cancelled when omitted */
  cycles?: number;
}

export interface FrameSentEvent {
  kind: FrameKind;
  /** Zero-based cycle number */
  cycle: number;
  /** Position of the entry within the cycle */
  position: number;
  bytes: Buffer;
}

export interface SchedulerRunSummary {
  /** Cycles completed in full */
  cycles: number;
  framesSent: number;
  /** True when the run ended through the AbortSignal */
  cancelled: boolean;
}

/**
 * Checks the schedule before anything is started.
 */
export function validateSchedule(
  entries: readonly ScheduleEntry[],
  options: TransmissionSchedulerOptions,
): string[] {
  const errors: string[] = [];

  if (entries.length === 0) {
    errors.push('Schedule must contain at least one frame');
  }

  entries.forEach((entry, position) => {
    if (!Number.isFinite(entry.dwellMs) || entry.dwellMs <= 0) {
      errors.push(`Dwell of ${entry.builder.kind} frame at position ${position} must be a positive number of milliseconds`);
    } else if (entry.dwellMs > MAX_SLEEP_MS) {
      errors.push(`Dwell of ${entry.builder.kind} frame at position ${position} must not exceed ${MAX_SLEEP_MS} ms`);
    }
  });

  if (!Number.isFinite(options.warmUpMs) || options.warmUpMs < 0) {
    errors.push('Warm-up must be zero or a positive number of milliseconds');
  } else if (options.warmUpMs > MAX_SLEEP_MS) {
    errors.push(`Warm-up must not exceed ${MAX_SLEEP_MS} ms`);
  }

  if (options.cycles !== undefined && (!Number.isInteger(options.cycles) || options.cycles < 1)) {
    errors.push('Cycle limit must be a positive integer');
  }

  return errors;
}

export class TransmissionScheduler extends EventEmitter {
  private readonly logger = createSubsystemLogger('sysmon/scheduler');
  private readonly entries: readonly ScheduleEntry[];
  private readonly link: SerialLink;
  private readonly warmUpMs: number;
  private readonly encoding: WireEncoding;
  private readonly clock: SchedulerClock;
  private readonly cycleLimit?: number;
  private currentState: SchedulerState = 'idle';

  constructor(entries: readonly ScheduleEntry[], link: SerialLink, options: TransmissionSchedulerOptions) {
    super();

    const errors = validateSchedule(entries, options);
    if (errors.length > 0) {
      throw new ConfigurationError('Invalid transmission schedule', errors);
    }

    this.entries = [...entries];
    this.link = link;
    this.warmUpMs = options.warmUpMs;
    this.encoding = options.encoding ?? 'latin1';
    this.clock = options.clock ?? systemClock;
    this.cycleLimit = options.cycles;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  /**
   * Runs the schedule. Resolves when cancelled or when the cycle limit is
   * reached; rejects with a TransmissionError when a write fails.
   */
  async run(signal?: AbortSignal): Promise<SchedulerRunSummary> {
    if (this.currentState !== 'idle') {
      throw new Error(`Scheduler cannot start from state '${this.currentState}'`);
    }

    const startedAt = this.clock.now();
    let cycle = 0;
    let framesSent = 0;
    const finish = (): SchedulerRunSummary => {
      this.setState('stopped');
      const summary = { cycles: cycle, framesSent, cancelled: signal?.aborted ?? false };
      this.logger.info('Transmission scheduler stopped', { ...summary, elapsedMs: this.clock.now() - startedAt });
      return summary;
    };

    this.setState('warming-up');
    this.logger.info('Waiting for display to initialise', { warmUpMs: this.warmUpMs, path: this.link.path });
    await this.clock.sleep(this.warmUpMs, signal);
    if (signal?.aborted) {
      return finish();
    }

    this.setState('running');
    this.logger.info('Transmitting frames', {
      frames: this.entries.map((entry) => entry.builder.kind),
      cycles: this.cycleLimit ?? 'unbounded',
    });

    while (this.cycleLimit === undefined || cycle < this.cycleLimit) {
      for (const [position, entry] of this.entries.entries()) {
        if (signal?.aborted) {
          return finish();
        }

        const frame = this.buildFrame(entry);
        const bytes = encodeFrame(frame, this.encoding);

        try {
          await this.link.write(bytes);
        } catch (error) {
          this.setState('stopped');
          const failure = new TransmissionError(frame.kind, error);
          this.logger.error('Frame transmission failed, stopping', {
            frame: frame.kind,
            cycle,
            position,
            elapsedMs: this.clock.now() - startedAt,
            error: failure.message,
          });
          this.emit('transmissionFailed', failure);
          throw failure;
        }

        framesSent++;
        const sent: FrameSentEvent = { kind: frame.kind, cycle, position, bytes };
        this.emit('frameSent', sent);
        this.logger.debug('Frame sent', { frame: frame.kind, rows: frame.rows });

        if (signal?.aborted) {
          return finish();
        }
        await this.clock.sleep(entry.dwellMs, signal);
      }
      cycle++;
    }

    return finish();
  }

  private setState(next: SchedulerState): void {
    const previous = this.currentState;
    this.currentState = next;
    this.emit('stateChanged', { from: previous, to: next });
  }

  /**
   * Builders degrade internally; a builder that still throws gets a
   * placeholder frame instead of ending the run.
   */
  private buildFrame(entry: ScheduleEntry): DisplayFrame {
    try {
      return entry.builder.build();
    } catch (error) {
      this.logger.error('Frame builder failed, sending placeholder frame', {
        frame: entry.builder.kind,
        error: error instanceof Error ? error.message : String(error),
      });
      return {
        kind: entry.builder.kind,
        rows: [fitRow(entry.builder.kind), centerRow(PLACEHOLDER_TEXT)],
      };
    }
  }
}
