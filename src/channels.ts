import type { DeviceProfile, PhysicalInput, Slot } from './types';
import { DEFAULT_PROFILE, PHYSICAL_INPUTS } from './constants';
import { InvalidChannelError } from './errors';

export const SLOTS: readonly Slot[] = [1, 2, 3, 4];

export const isPhysicalInput = (name: string): name is PhysicalInput =>
  PHYSICAL_INPUTS.some((input) => input === name);

export class ChannelRegistry {
  private channelOne: PhysicalInput = 'CH1';

  constructor(private profile: DeviceProfile = DEFAULT_PROFILE) {}

  get channelOneMap(): PhysicalInput { return this.channelOne; }

  resolve(slot: Slot): PhysicalInput {
    switch (slot) {
      case 1: return this.channelOne;
      case 2:
      case 3:
      case 4: return this.profile.fixedSlots[slot];
    }
  }

  remap(slot: Slot, name: string): void {
    if (slot !== 1) throw new InvalidChannelError(`CH${slot}`, `Only channel one can be remapped, not slot ${slot}.`);
    if (!isPhysicalInput(name) || !this.profile.channelOneOptions.includes(name)) {
      throw new InvalidChannelError(name, `Invalid channel one map "${name}". Valid inputs are ${this.profile.channelOneOptions.join(', ')}.`);
    }
    this.channelOne = name;
  }

  /** Slots currently bound to `input`, in slot order. */
  slotsOf(input: PhysicalInput): Slot[] {
    return SLOTS.filter((slot) => this.resolve(slot) === input);
  }

  assigned(): PhysicalInput[] { return SLOTS.map((slot) => this.resolve(slot)); }
}
