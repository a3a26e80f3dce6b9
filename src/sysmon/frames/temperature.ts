/**
 * Temperature frame
 *
 *   'CPU  Temp XXX.XC'
 *   'MoBo Temp XXX.XC'
 *
 * Each row reads its own configured sensor. A missing sensor shows the
 * placeholder and is logged; the frame is always rendered.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { FormatSpec, FrameBuilder, MetricsProvider, SensorReading, SensorRef } from '../types/index.js';
import { fieldOrPlaceholder, makeFrame } from './frame-support.js';

const log = createSubsystemLogger('sysmon/frames');

const TEMPERATURE_FIELD: FormatSpec = { integerDigits: 3, decimalDigits: 1 };

export interface TemperatureSensors {
  cpu: SensorRef;
  mainboard: SensorRef;
}

function describeSensor(sensor: SensorRef): string {
  return `${sensor.chip}[${sensor.index}]`;
}

export function createTemperatureFrameBuilder(
  metrics: MetricsProvider,
  sensors: TemperatureSensors,
): FrameBuilder {
  const readCelsius = (role: string, sensor: SensorRef): number | undefined => {
    let reading: SensorReading;
    try {
      reading = metrics.readSensor(sensor);
    } catch (error) {
      reading = { present: false, reason: error instanceof Error ? error.message : String(error) };
    }

    if (!reading.present) {
      log.warn('Temperature sensor unavailable, rendering placeholder', {
        role,
        sensor: describeSensor(sensor),
        reason: reading.reason,
      });
      return undefined;
    }
    return reading.value;
  };

  return {
    kind: 'temperature',
    build() {
      const cpu = readCelsius('cpu', sensors.cpu);
      const mainboard = readCelsius('mainboard', sensors.mainboard);

      return makeFrame(
        'temperature',
        `CPU  Temp ${fieldOrPlaceholder(cpu, TEMPERATURE_FIELD)}C`,
        `MoBo Temp ${fieldOrPlaceholder(mainboard, TEMPERATURE_FIELD)}C`,
      );
    },
  };
}
