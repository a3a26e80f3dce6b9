/**
 * Wire encoding: row 1 then row 2, one byte per character, no delimiter.
 */

import { fitRow } from '../formatter/layout.js';
import type { DisplayFrame, WireEncoding } from '../types/index.js';

export function encodeFrame(frame: DisplayFrame, encoding: WireEncoding = 'latin1'): Buffer {
  return Buffer.from(fitRow(frame.rows[0]) + fitRow(frame.rows[1]), encoding);
}
