import type { BitDepth, CalibrationEntry, DeviceProfile, PhysicalInput, RangeCalibration } from './types';
import { DEFAULT_PROFILE } from './constants';
import { DeviceRangeError, InvalidChannelError } from './errors';
import { clamp, fmt } from './utils';

export const topCode = (bits: BitDepth) => 2 ** bits - 1;

/** Calibrated end points per input, one entry per selectable range ordered widest first. */
export class CalibrationTable {
  constructor(private table: Partial<Record<PhysicalInput, readonly RangeCalibration[]>>) {}

  /** Nominal table: every gain divides the input's base span. */
  static ideal(profile: DeviceProfile = DEFAULT_PROFILE): CalibrationTable {
    const table: Partial<Record<PhysicalInput, RangeCalibration[]>> = {};
    for (const input of profile.inputs) {
      const { low, high } = profile.spans[input];
      const gains = profile.gains[input] ?? [1];
      table[input] = gains.map((gain) => ({
        fullScale: Math.max(Math.abs(low), Math.abs(high)) / gain,
        low: low / gain,
        high: high / gain,
      }));
    }
    return new CalibrationTable(table);
  }

  has(input: PhysicalInput): boolean { return (this.table[input]?.length ?? 0) > 0; }

  ranges(input: PhysicalInput): readonly RangeCalibration[] {
    const ranges = this.table[input];
    if (!ranges || ranges.length === 0) throw new InvalidChannelError(input, `No calibration loaded for ${input}.`);
    return ranges;
  }

  entry(input: PhysicalInput, rangeIndex: number, bits: BitDepth): CalibrationEntry {
    const range = this.ranges(input)[rangeIndex];
    if (!range) throw new DeviceRangeError('range-unsupported', `${input} has no range #${rangeIndex}.`);
    return { slope: (range.high - range.low) / topCode(bits), intercept: range.low };
  }
}

export class VoltageConverter {
  private selection = new Map<PhysicalInput, number>();

  constructor(private calibration: CalibrationTable) {}

  has(input: PhysicalInput): boolean { return this.calibration.has(input); }

  ranges(input: PhysicalInput): readonly RangeCalibration[] { return this.calibration.ranges(input); }

  rangeIndex(input: PhysicalInput): number { return this.selection.get(input) ?? 0; }

  fullScale(input: PhysicalInput): number { return this.calibration.ranges(input)[this.rangeIndex(input)].fullScale; }

  entry(input: PhysicalInput, bits: BitDepth): CalibrationEntry {
    return this.calibration.entry(input, this.rangeIndex(input), bits);
  }

  toVolts(input: PhysicalInput, raw: ArrayLike<number>, bits: BitDepth): Float64Array {
    const { slope, intercept } = this.entry(input, bits);
    const volts = new Float64Array(raw.length);
    for (let i = 0; i < raw.length; i++) volts[i] = slope * raw[i] + intercept;
    return volts;
  }

  toRaw(input: PhysicalInput, volts: number, bits: BitDepth): number {
    const { slope, intercept } = this.entry(input, bits);
    return clamp(Math.round((volts - intercept) / slope), 0, topCode(bits));
  }

  /** Smallest range whose full scale still covers `desired` volts. */
  rangeIndexFor(input: PhysicalInput, desired: number): number {
    const ranges = this.calibration.ranges(input);
    if (!Number.isFinite(desired) || desired <= 0) {
      throw new DeviceRangeError('range-unsupported', `Voltage range must be a positive number, got ${desired}.`);
    }
    let best = -1;
    ranges.forEach((range, i) => {
      if (range.fullScale >= desired && (best < 0 || range.fullScale < ranges[best].fullScale)) best = i;
    });
    if (best < 0) {
      const widest = Math.max(...ranges.map((r) => r.fullScale));
      throw new DeviceRangeError('range-unsupported', `${input} cannot measure ±${fmt(desired)} V; the widest range is ±${fmt(widest, 3)} V.`);
    }
    return best;
  }

  selectRange(input: PhysicalInput, desired: number): number {
    const index = this.rangeIndexFor(input, desired);
    this.setRangeIndex(input, index);
    return index;
  }

  setRangeIndex(input: PhysicalInput, index: number): void {
    if (!this.calibration.ranges(input)[index]) throw new DeviceRangeError('range-unsupported', `${input} has no range #${index}.`);
    this.selection.set(input, index);
  }
}
