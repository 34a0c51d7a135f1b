export type PhysicalInput = 'CH1' | 'CH2' | 'CH3' | 'MIC' | 'CAP' | 'RES' | 'VOL' | 'AN4';

export type Slot = 1 | 2 | 3 | 4;
export type ChannelCount = Slot;
export type BitDepth = 10 | 12;

export interface CaptureRequest {
  channels: number;
  samples: number;
  timegapUs: number;
}

export interface CaptureResult {
  timeUs: Float64Array;
  voltages: Float64Array[];
  inputs: PhysicalInput[];
  bitDepth: BitDepth;
}

export interface TriggerState {
  enabled: boolean;
  input: PhysicalInput;
  level: number; // volts
}

/** Volts read at raw code 0 (`low`) and at the top code (`high`) for one full-scale span. */
export interface RangeCalibration {
  fullScale: number;
  low: number;
  high: number;
}

export interface CalibrationEntry {
  slope: number;
  intercept: number;
}

export interface DeviceLimits {
  maxSamples: number;
  minTimegapUs: Record<ChannelCount, number>;
}

export interface DeviceProfile {
  inputs: readonly PhysicalInput[];
  channelOneOptions: readonly PhysicalInput[];
  fixedSlots: Record<2 | 3 | 4, PhysicalInput>;
  triggerable: readonly PhysicalInput[];
  multiplexer: Record<PhysicalInput, number>;
  spans: Record<PhysicalInput, { low: number; high: number }>;
  gains: Partial<Record<PhysicalInput, readonly number[]>>;
  limits: DeviceLimits;
  clockTicksPerUs: number;
}

export type DeviceCommand =
  | { kind: 'set-range'; input: PhysicalInput; gainIndex: number }
  | {
      kind: 'capture';
      inputs: PhysicalInput[];
      samples: number;
      timegapUs: number;
      bitDepth: BitDepth;
      trigger: { slot: Slot; threshold: number } | null;
    };

export interface ReadOptions {
  timeoutMs?: number;
}

export interface Transport {
  onStatus: (text: string) => void;
  connect(): Promise<void>;
  sendCommand(command: DeviceCommand): Promise<void>;
  readSamples(count: number, bitDepth: BitDepth, options?: ReadOptions): Promise<number[]>;
  close(): Promise<void>;
}
