import type { CaptureResult, DeviceProfile, PhysicalInput, RangeCalibration, Transport, TriggerState } from './types';
import { AcquisitionEngine } from './acquisition';
import { CalibrationTable, VoltageConverter } from './calibration';
import { ChannelRegistry, isPhysicalInput } from './channels';
import { DEFAULT_PROFILE } from './constants';
import { InvalidChannelError } from './errors';
import { TriggerController } from './trigger';
import { fmt } from './utils';

export interface SessionOptions {
  transport: Transport;
  profile?: DeviceProfile;
  /** Device calibration; defaults to the nominal table for `profile`. */
  calibration?: CalibrationTable;
  /** Passed to every sample read. Unset means wait for the device indefinitely. */
  readTimeoutMs?: number;
  onStatus?: (text: string) => void;
}

/**
 * One device, one session. Owns channel mapping, trigger and range state, and serializes
 * every device operation so a capture always finishes before the next command goes out.
 */
export class DeviceSession {
  readonly registry: ChannelRegistry;
  readonly trigger: TriggerController;
  readonly converter: VoltageConverter;
  private engine: AcquisitionEngine;
  private transport: Transport;
  private setStatus: (text: string) => void;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: SessionOptions) {
    const profile = options.profile ?? DEFAULT_PROFILE;
    this.transport = options.transport;
    this.setStatus = options.onStatus ?? (() => {});
    this.transport.onStatus = (t) => this.setStatus(t);

    this.registry = new ChannelRegistry(profile);
    this.trigger = new TriggerController(this.registry, profile);
    this.converter = new VoltageConverter(options.calibration ?? CalibrationTable.ideal(profile));
    const readOptions = options.readTimeoutMs === undefined ? {} : { timeoutMs: options.readTimeoutMs };
    this.engine = new AcquisitionEngine(this.transport, this.registry, this.trigger, this.converter, profile, readOptions);
  }

  connect(): Promise<void> { return this.exclusive(() => this.transport.connect()); }
  close(): Promise<void> { return this.exclusive(() => this.transport.close()); }

  get channelOneMap(): PhysicalInput { return this.registry.channelOneMap; }

  setChannelOneMap(name: string) { this.registry.remap(1, name); }

  get triggerState(): TriggerState { return this.trigger.state; }

  configureTrigger(channel: string, voltage: number) { this.trigger.configure(channel, voltage); }
  enableTrigger() { this.trigger.enable(); }
  disableTrigger() { this.trigger.disable(); }

  ranges(channel: string): readonly RangeCalibration[] { return this.converter.ranges(this.input(channel)); }

  /** Picks the narrowest range covering ±`voltage` on `channel` and programs the gain on the device. */
  selectRange(channel: string, voltage: number): Promise<void> {
    return this.exclusive(async () => {
      const input = this.input(channel);
      const index = this.converter.rangeIndexFor(input, voltage);
      await this.transport.sendCommand({ kind: 'set-range', input, gainIndex: index });
      this.converter.setRangeIndex(input, index);
      this.setStatus(`${input} range ±${fmt(this.converter.fullScale(input), 3)} V`);
    });
  }

  /** Returns the shared time axis (µs) and one voltage array per channel, slot 1 first. */
  capture(channels: number, samples: number, timegapUs: number): Promise<CaptureResult> {
    const request = { channels, samples, timegapUs };
    // Reject bad requests without waiting behind a running capture. The plan is rebuilt once the
    // device is ours, since queued range writes ahead of this call change the calibration in use.
    try {
      this.engine.plan(request);
    } catch (error) {
      return Promise.reject(error);
    }
    return this.exclusive(async () => {
      const plan = this.engine.plan(request);
      this.setStatus(`Capturing ${plan.channels} channel(s) × ${plan.samples} samples at ${fmt(plan.timegapUs, 3)} µs`);
      const result = await this.engine.execute(plan);
      this.setStatus('Capture complete');
      return result;
    });
  }

  private input(channel: string): PhysicalInput {
    if (!isPhysicalInput(channel)) throw new InvalidChannelError(channel);
    return channel;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
