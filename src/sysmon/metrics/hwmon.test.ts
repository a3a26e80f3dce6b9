/**
 * hwmon Sensor Discovery Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { listTemperatureSensors, readTemperatureSensor } from './hwmon.js';
import { virtualFs } from '../test-setup.js';

vi.mock('node:fs', async () => (await import('../test-setup.js')).virtualFsModule);

const ROOT = '/sys/class/hwmon';

describe('hwmon temperature sensors', () => {
  beforeEach(() => {
    virtualFs.reset();
    // Directory listing order is deliberately not numeric
    virtualFs.addFile(`${ROOT}/hwmon10/name`, 'nvme\n');
    virtualFs.addFile(`${ROOT}/hwmon10/temp1_input`, '33850\n');
    virtualFs.addFile(`${ROOT}/hwmon2/name`, 'k10temp\n');
    virtualFs.addFile(`${ROOT}/hwmon2/temp3_input`, '41000\n');
    virtualFs.addFile(`${ROOT}/hwmon2/temp3_label`, 'Tccd1\n');
    virtualFs.addFile(`${ROOT}/hwmon2/temp1_input`, '45125\n');
    virtualFs.addFile(`${ROOT}/hwmon2/temp1_label`, 'Tctl\n');
    virtualFs.addFile(`${ROOT}/hwmon2/temp1_max`, '95000\n');
    virtualFs.addFile(`${ROOT}/hwmon1/name`, 'nvme\n');
    virtualFs.addFile(`${ROOT}/hwmon1/temp1_input`, '38850\n');
    virtualFs.addFile(`${ROOT}/hwmon0/name`, 'acpitz\n');
    virtualFs.addFile(`${ROOT}/hwmon0/temp1_input`, '27800\n');
  });

  describe('listTemperatureSensors', () => {
    it('should list inputs in hwmon and input order with per-chip indices', () => {
      const sensors = listTemperatureSensors();

      expect(sensors.map((s) => `${s.chip}[${s.index}] ${s.label}=${s.current}`)).toEqual([
        'acpitz[0] temp1=27.8',
        'nvme[0] temp1=38.85',
        'k10temp[0] Tctl=45.125',
        'k10temp[1] Tccd1=41',
        'nvme[1] temp1=33.85',
      ]);
    });

    it('should report the sysfs path of each input', () => {
      const [first] = listTemperatureSensors();

      expect(first.path).toBe('/sys/class/hwmon/hwmon0/temp1_input');
    });

    it('should report unreadable inputs with a null value', () => {
      virtualFs.addFile(`${ROOT}/hwmon0/temp1_input`, new Error('EIO: i/o error, read'));

      const [first] = listTemperatureSensors();

      expect(first.current).toBeNull();
    });

    it('should fall back to the directory name for chips without a name file', () => {
      virtualFs.removeFile(`${ROOT}/hwmon0/name`);

      const [first] = listTemperatureSensors();

      expect(first.chip).toBe('hwmon0');
    });

    it('should return nothing when hwmon is not available', () => {
      expect(listTemperatureSensors('/nonexistent/hwmon')).toEqual([]);
    });
  });

  describe('readTemperatureSensor', () => {
    it('should read a sensor by chip and index', () => {
      expect(readTemperatureSensor({ chip: 'k10temp', index: 1 })).toEqual({ present: true, value: 41 });
      expect(readTemperatureSensor({ chip: 'nvme', index: 1 })).toEqual({ present: true, value: 33.85 });
    });

    it('should report a missing chip as absent', () => {
      expect(readTemperatureSensor({ chip: 'thinkpad', index: 0 })).toEqual({
        present: false,
        reason: "no hwmon chip named 'thinkpad'",
      });
    });

    it('should report a missing index as absent', () => {
      expect(readTemperatureSensor({ chip: 'acpitz', index: 3 })).toEqual({
        present: false,
        reason: "chip 'acpitz' has 1 temperature input(s), no index 3",
      });
    });

    it('should report an unreadable value as absent', () => {
      virtualFs.addFile(`${ROOT}/hwmon0/temp1_input`, 'garbage\n');

      expect(readTemperatureSensor({ chip: 'acpitz', index: 0 })).toEqual({
        present: false,
        reason: 'unreadable value at /sys/class/hwmon/hwmon0/temp1_input',
      });
    });
  });
});
