import type { BitDepth, CaptureRequest, CaptureResult, ChannelCount, DeviceProfile, PhysicalInput, ReadOptions, Slot, Transport } from './types';
import type { ChannelRegistry } from './channels';
import type { TriggerController } from './trigger';
import type { VoltageConverter } from './calibration';
import { SLOTS } from './channels';
import { topCode } from './calibration';
import { DEFAULT_PROFILE, RESOLUTION_BY_CHANNELS } from './constants';
import { DeviceRangeError, InvalidChannelError, TransportError } from './errors';
import { CaptureData } from './model';
import { fmt } from './utils';

export interface CapturePlan {
  channels: ChannelCount;
  inputs: PhysicalInput[];
  samples: number;
  timegapUs: number;
  bitDepth: BitDepth;
  trigger: { slot: Slot; threshold: number } | null;
}

const isChannelCount = (n: number): n is ChannelCount => n === 1 || n === 2 || n === 3 || n === 4;

export const resolutionFor = (channels: ChannelCount): BitDepth => RESOLUTION_BY_CHANNELS[channels];

export class AcquisitionEngine {
  constructor(
    private transport: Transport,
    private registry: ChannelRegistry,
    private trigger: TriggerController,
    private converter: VoltageConverter,
    private profile: DeviceProfile = DEFAULT_PROFILE,
    private readOptions: ReadOptions = {},
  ) {}

  /** Validates `request` against the current mapping and device limits. Touches nothing. */
  plan(request: CaptureRequest): CapturePlan {
    const { channels, samples, timegapUs } = request;
    const { maxSamples, minTimegapUs } = this.profile.limits;

    if (!isChannelCount(channels)) {
      throw new DeviceRangeError('too-many-channels', `Number of channels to sample must be 1, 2, 3 or 4, got ${channels}.`);
    }

    const inputs = SLOTS.slice(0, channels).map((slot) => this.registry.resolve(slot));
    for (const input of inputs) {
      if (!this.profile.inputs.includes(input) || !this.converter.has(input)) throw new InvalidChannelError(input);
    }

    const minimum = minTimegapUs[channels];
    if (!Number.isFinite(timegapUs) || timegapUs < minimum) {
      throw new DeviceRangeError('timegap-too-small', `Timegap must be at least ${fmt(minimum, 3)} µs when sampling ${channels} channel(s), got ${timegapUs}.`);
    }

    if (!Number.isInteger(samples) || samples <= 0) {
      throw new DeviceRangeError('invalid-sample-count', `Sample count must be a positive integer, got ${samples}.`);
    }
    if (samples * channels > maxSamples) {
      throw new DeviceRangeError('too-many-samples', `Cannot collect more than ${Math.floor(maxSamples / channels)} samples when sampling ${channels} channel(s).`);
    }

    // The device counts in whole clock ticks; the plan carries the spacing it will really use.
    const { clockTicksPerUs } = this.profile;
    const spacingUs = Math.max(1, Math.round(timegapUs * clockTicksPerUs)) / clockTicksPerUs;

    const bitDepth = resolutionFor(channels);
    const source = this.trigger.sourceFor(inputs);
    let trigger: CapturePlan['trigger'] = null;
    if (source) {
      const fullScale = this.converter.fullScale(source.input);
      if (Math.abs(source.level) > fullScale) {
        throw new DeviceRangeError('level-out-of-range', `Trigger level ${fmt(source.level)} V is outside the ±${fmt(fullScale, 3)} V range of ${source.input}.`);
      }
      trigger = { slot: source.slot, threshold: this.converter.toRaw(source.input, source.level, bitDepth) };
    }

    return { channels, inputs, samples, timegapUs: spacingUs, bitDepth, trigger };
  }

  async execute(plan: CapturePlan): Promise<CaptureResult> {
    const { inputs, samples, timegapUs, bitDepth, trigger } = plan;
    await this.transport.sendCommand({ kind: 'capture', inputs, samples, timegapUs, bitDepth, trigger });

    const data = new CaptureData();
    data.beginFrame(inputs, samples, timegapUs, bitDepth);
    for (const [index, input] of inputs.entries()) {
      const raw = await this.transport.readSamples(samples, bitDepth, this.readOptions);
      checkBlock(raw, samples, bitDepth, input);
      data.setChannel(index, this.converter.toVolts(input, raw, bitDepth));
    }
    return data.finalize();
  }

  async capture(request: CaptureRequest): Promise<CaptureResult> {
    const plan = this.plan(request);
    return this.execute(plan);
  }
}

function checkBlock(raw: readonly number[], samples: number, bits: BitDepth, input: PhysicalInput) {
  if (raw.length !== samples) throw new TransportError(`Expected ${samples} samples for ${input}, received ${raw.length}.`);
  const top = topCode(bits);
  const bad = raw.findIndex((v) => !Number.isInteger(v) || v < 0 || v > top);
  if (bad >= 0) throw new TransportError(`Sample ${bad} for ${input} is not a ${bits}-bit code: ${raw[bad]}.`);
}
