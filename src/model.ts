import type { BitDepth, CaptureResult, PhysicalInput } from './types';
import { TransportError } from './errors';

/** Buffer for one capture: shared time axis plus one voltage array per slot, filled in slot order. */
export class CaptureData {
  samples = 0;
  filled = 0;
  bitDepth: BitDepth = 10;
  inputs: PhysicalInput[] = [];
  timeUs: Float64Array | null = null;
  voltages: Float64Array[] | null = null;
  ready = false;

  reset() {
    this.samples = 0;
    this.filled = 0;
    this.inputs = [];
    this.timeUs = null;
    this.voltages = null;
    this.ready = false;
  }

  beginFrame(inputs: readonly PhysicalInput[], samples: number, timegapUs: number, bitDepth: BitDepth) {
    this.inputs = [...inputs];
    this.samples = samples >>> 0;
    this.bitDepth = bitDepth;
    this.filled = 0;
    this.ready = false;

    this.timeUs = new Float64Array(this.samples);
    for (let i = 0; i < this.samples; i++) this.timeUs[i] = i * timegapUs;
    this.voltages = this.inputs.map(() => new Float64Array(this.samples));
  }

  setChannel(index: number, volts: ArrayLike<number>) {
    if (!this.voltages || index !== this.filled) throw new TransportError(`Channel ${index + 1} delivered out of order.`);
    if (volts.length !== this.samples) throw new TransportError(`Channel ${index + 1} has ${volts.length} samples, expected ${this.samples}.`);
    this.voltages[index].set(volts);
    this.filled = index + 1;
    if (this.filled === this.inputs.length) this.ready = true;
  }

  /** Hands the buffers to the caller and forgets them. */
  finalize(): CaptureResult {
    if (!this.ready || !this.timeUs || !this.voltages) throw new TransportError(`Capture incomplete: ${this.filled} of ${this.inputs.length} channels received.`);
    const result: CaptureResult = { timeUs: this.timeUs, voltages: this.voltages, inputs: this.inputs, bitDepth: this.bitDepth };
    this.reset();
    return result;
  }
}
