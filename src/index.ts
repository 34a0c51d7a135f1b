export * from './types';
export { DEFAULT_PROFILE, PGA_GAINS, PHYSICAL_INPUTS, RESOLUTION_BY_CHANNELS } from './constants';
export { DeviceRangeError, InvalidChannelError, TransportError, TypeMismatchError } from './errors';
export type { DeviceRangeReason } from './errors';
export { ChannelRegistry, isPhysicalInput } from './channels';
export { CalibrationTable, VoltageConverter } from './calibration';
export { TriggerController } from './trigger';
export { AcquisitionEngine, resolutionFor } from './acquisition';
export type { CapturePlan } from './acquisition';
export { CaptureData } from './model';
export { DeviceSession } from './session';
export type { SessionOptions } from './session';
export { SerialTransport, SimulationTransport, encodeCommand, parseSamples, sine } from './serial';
export type { SerialLink, SerialTransportOptions, Signal, SimulationOptions } from './serial';
