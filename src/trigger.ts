import type { DeviceProfile, PhysicalInput, Slot, TriggerState } from './types';
import type { ChannelRegistry } from './channels';
import { SLOTS, isPhysicalInput } from './channels';
import { DEFAULT_PROFILE } from './constants';
import { DeviceRangeError, TypeMismatchError } from './errors';

export class TriggerController {
  private enabled = false;
  private input: PhysicalInput = 'CH1';
  private level = 0;

  constructor(private registry: ChannelRegistry, private profile: DeviceProfile = DEFAULT_PROFILE) {}

  get state(): TriggerState { return { enabled: this.enabled, input: this.input, level: this.level }; }

  /** Arms the trigger on `channel` at `level` volts. A rejected call keeps the previous configuration. */
  configure(channel: string, level: number): void {
    if (!isPhysicalInput(channel)) throw new TypeMismatchError(channel, `"${channel}" is not an analog input and cannot trigger a capture.`);
    this.checkRoutable(channel);
    if (!Number.isFinite(level)) throw new DeviceRangeError('level-out-of-range', `Trigger level must be a finite voltage, got ${level}.`);
    this.input = channel;
    this.level = level;
    this.enabled = true;
  }

  enable() { this.enabled = true; }
  disable() { this.enabled = false; }

  /**
   * Slot the device should watch for a capture over `inputs`, or null when disarmed.
   * The armed input has to be routed, triggerable and part of the capture.
   */
  sourceFor(inputs: readonly PhysicalInput[]): { slot: Slot; input: PhysicalInput; level: number } | null {
    if (!this.enabled) return null;
    this.checkRoutable(this.input);
    const slot = SLOTS.find((_, i) => inputs[i] === this.input);
    if (slot === undefined) {
      throw new TypeMismatchError(this.input, `Trigger channel ${this.input} is not among the captured inputs (${inputs.join(', ')}).`);
    }
    return { slot, input: this.input, level: this.level };
  }

  private checkRoutable(input: PhysicalInput) {
    if (!this.profile.triggerable.includes(input)) {
      throw new TypeMismatchError(input, `${input} is not a front-end ADC input and cannot trigger a capture.`);
    }
    if (this.registry.slotsOf(input).length === 0) {
      throw new TypeMismatchError(input, `${input} is not mapped to any capture slot (channel one is ${this.registry.channelOneMap}).`);
    }
  }
}
