/**
 * SysmonConfiguration Interface
 *
 * Immutable runtime configuration for one serial display.
 */

import type { FrameKind } from './display-frame.js';
import type { SensorRef } from './system-metrics.js';

/** Single-byte text encodings accepted on the wire */
export type WireEncoding = 'ascii' | 'latin1';

export interface SysmonConfiguration {
  /** Serial transport settings */
  serial: {
    /** Device path, e.g. '/dev/ttyACM0' or 'COM3' */
    path: string;
    /** Line speed in baud */
    baudRate: number;
    /** Text encoding of the 32-byte payload */
    encoding: WireEncoding;
  };

  /** Pause after opening the port before the first frame, in milliseconds */
  warmUpMs: number;

  /** Pause after each frame, in milliseconds */
  dwellMs: number;

  /** Frames to cycle through, in order */
  frames: FrameKind[];

  /** Sensors shown on the temperature frame */
  sensors: {
    cpu: SensorRef;
    mainboard: SensorRef;
  };
}
