import { ReadlineParser, SerialPort } from 'serialport';
import type { SerialPortStream } from '@serialport/stream';
import type { BitDepth, DeviceCommand, DeviceProfile, PhysicalInput, ReadOptions, Transport } from './types';
import { CalibrationTable, topCode } from './calibration';
import { DEFAULT_PROFILE } from './constants';
import { TransportError } from './errors';
import { clamp, fmt } from './utils';

export type SerialLink = Pick<SerialPortStream, 'isOpen' | 'open' | 'write' | 'drain' | 'close' | 'pipe' | 'on'>;

export type SerialTransportOptions = { profile?: DeviceProfile } & ({ port: SerialLink } | { path: string; baudRate?: number });

/**
 * Line protocol, one command per line:
 *   R <mux> <gain index>
 *   C <mux,...> <samples> <clock ticks> <bits> <trigger slot|-> <threshold>
 *   F <count>          -> device answers with one line of comma separated codes
 * A line starting with `E ` is a device-side error.
 */
export function encodeCommand(command: DeviceCommand, profile: DeviceProfile = DEFAULT_PROFILE): string {
  switch (command.kind) {
    case 'set-range':
      return `R ${profile.multiplexer[command.input]} ${command.gainIndex}`;
    case 'capture': {
      const mux = command.inputs.map((input) => profile.multiplexer[input]).join(',');
      const ticks = Math.round(command.timegapUs * profile.clockTicksPerUs);
      const trigger = command.trigger ? `${command.trigger.slot} ${command.trigger.threshold}` : '- 0';
      return `C ${mux} ${command.samples} ${ticks} ${command.bitDepth} ${trigger}`;
    }
  }
}

export function parseSamples(line: string, count: number): number[] {
  if (line.startsWith('E ')) throw new TransportError(`Device error: ${line.slice(2)}`);
  const codes = line.split(',').map((x) => parseInt(x, 10));
  if (codes.some(Number.isNaN)) throw new TransportError(`Malformed sample line: "${line.slice(0, 40)}"`);
  if (codes.length !== count) throw new TransportError(`Expected ${count} samples, received ${codes.length}.`);
  return codes;
}

export class SerialTransport implements Transport {
  readonly port: SerialLink;
  onStatus: (text: string) => void = () => {};
  private profile: DeviceProfile;
  private lines: string[] = [];
  private waiting: { resolve: (line: string) => void; reject: (error: Error) => void } | null = null;

  constructor(options: SerialTransportOptions) {
    this.profile = options.profile ?? DEFAULT_PROFILE;
    this.port = 'port' in options
      ? options.port
      : new SerialPort({ path: options.path, baudRate: options.baudRate ?? 1000000, autoOpen: false });
    const parser = this.port.pipe(new ReadlineParser({ delimiter: '\n' }));
    parser.on('data', (line: string) => this.onLine(line.trim()));
    this.port.on('error', (err: Error) => {
      this.onStatus('Port error: ' + err.message);
      this.fail(new TransportError(`Serial port error: ${err.message}`, { cause: err }));
    });
  }

  async connect(): Promise<void> {
    if (this.port.isOpen) return;
    await new Promise<void>((resolve, reject) => {
      this.port.open((err) => (err ? reject(new TransportError(`Could not open serial port: ${err.message}`, { cause: err })) : resolve()));
    });
    this.lines = [];
    this.onStatus('Connected');
  }

  async sendCommand(command: DeviceCommand): Promise<void> {
    this.lines = [];
    await this.writeLine(encodeCommand(command, this.profile));
  }

  async readSamples(count: number, bitDepth: BitDepth, options: ReadOptions = {}): Promise<number[]> {
    // A reply that missed an earlier timeout must not answer this fetch.
    this.lines = [];
    await this.writeLine(`F ${count}`);
    const codes = parseSamples(await this.nextLine(options.timeoutMs), count);
    const top = topCode(bitDepth);
    if (codes.some((code) => code < 0 || code > top)) throw new TransportError(`Sample codes exceed ${bitDepth} bits.`);
    return codes;
  }

  async close(): Promise<void> {
    this.fail(new TransportError('Serial port closed'));
    if (this.port.isOpen) {
      await new Promise<void>((resolve, reject) => {
        this.port.close((err) => (err ? reject(new TransportError(`Could not close serial port: ${err.message}`, { cause: err })) : resolve()));
      });
    }
    this.onStatus('Disconnected');
  }

  private async writeLine(text: string): Promise<void> {
    if (!this.port.isOpen) throw new TransportError('Port not open');
    await new Promise<void>((resolve, reject) => {
      this.port.write(`${text}\n`, (err) => {
        if (err) { reject(new TransportError(`Write failed: ${err.message}`, { cause: err })); return; }
        this.port.drain((drainErr) => (drainErr ? reject(new TransportError(`Drain failed: ${drainErr.message}`, { cause: drainErr })) : resolve()));
      });
    });
  }

  private nextLine(timeoutMs?: number): Promise<string> {
    const queued = this.lines.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    return new Promise<string>((resolve, reject) => {
      const timer = timeoutMs === undefined ? null : setTimeout(() => {
        this.waiting = null;
        reject(new TransportError(`No response from device within ${timeoutMs} ms`));
      }, timeoutMs);
      const settle = () => { if (timer) clearTimeout(timer); };
      this.waiting = {
        resolve: (line) => { settle(); resolve(line); },
        reject: (error) => { settle(); reject(error); },
      };
    });
  }

  private onLine(line: string) {
    if (!line) return;
    const waiting = this.waiting;
    if (waiting) { this.waiting = null; waiting.resolve(line); }
    else this.lines.push(line);
  }

  private fail(error: Error) {
    const waiting = this.waiting;
    this.waiting = null;
    waiting?.reject(error);
  }
}

export type Signal = (timeUs: number) => number;

export const sine = ({ frequencyHz, amplitude, phase = 0, offset = 0 }: { frequencyHz: number; amplitude: number; phase?: number; offset?: number }): Signal =>
  (timeUs) => offset + amplitude * Math.sin(2 * Math.PI * frequencyHz * timeUs * 1e-6 + phase);

export interface SimulationOptions {
  signals?: Partial<Record<PhysicalInput, Signal>>;
  calibration?: CalibrationTable;
  /** How long the device waits for a trigger crossing before capturing anyway (µs). */
  triggerHorizonUs?: number;
  triggerStepUs?: number;
}

const DEFAULT_SIGNAL = sine({ frequencyHz: 1000, amplitude: 2.5 });

/** In-process device model: quantizes per-input signals on a shared clock. */
export class SimulationTransport implements Transport {
  onStatus: (text: string) => void = () => {};
  clockUs = 0;
  readonly commands: DeviceCommand[] = [];
  private connected = false;
  private gains = new Map<PhysicalInput, number>();
  private pending: number[][] = [];
  private pendingBits: BitDepth | null = null;
  private signals: Partial<Record<PhysicalInput, Signal>>;
  private calibration: CalibrationTable;
  private horizonUs: number;
  private stepUs: number;

  constructor(options: SimulationOptions = {}) {
    this.signals = options.signals ?? { CH1: DEFAULT_SIGNAL, CH2: DEFAULT_SIGNAL, CH3: DEFAULT_SIGNAL, MIC: DEFAULT_SIGNAL };
    this.calibration = options.calibration ?? CalibrationTable.ideal();
    this.horizonUs = options.triggerHorizonUs ?? 2000;
    this.stepUs = options.triggerStepUs ?? 0.01;
  }

  async connect(): Promise<void> {
    this.connected = true;
    this.onStatus('Simulator Ready');
  }

  async sendCommand(command: DeviceCommand): Promise<void> {
    if (!this.connected) throw new TransportError('Simulator not connected');
    this.commands.push(command);

    if (command.kind === 'set-range') {
      if (!this.calibration.ranges(command.input)[command.gainIndex]) throw new TransportError(`Gain #${command.gainIndex} not available on ${command.input}`);
      this.gains.set(command.input, command.gainIndex);
      return;
    }

    const { inputs, samples, timegapUs, bitDepth, trigger } = command;
    let start = this.clockUs;
    if (trigger) {
      const input = inputs[trigger.slot - 1];
      const { slope, intercept } = this.entry(input, bitDepth);
      start = this.findRisingEdge(input, slope * trigger.threshold + intercept);
    }

    this.pending = inputs.map((input) => {
      const signal = this.signal(input);
      const block: number[] = [];
      for (let i = 0; i < samples; i++) block.push(this.quantize(input, signal(start + i * timegapUs), bitDepth));
      return block;
    });
    this.pendingBits = bitDepth;
    this.clockUs = start + samples * timegapUs;
  }

  async readSamples(count: number, bitDepth: BitDepth): Promise<number[]> {
    if (bitDepth !== this.pendingBits) throw new TransportError(`Requested ${bitDepth}-bit samples, capture ran at ${this.pendingBits ?? 'no'} bits`);
    const block = this.pending.shift();
    if (!block) throw new TransportError('No capture data pending');
    return block.slice(0, count);
  }

  async close(): Promise<void> {
    this.connected = false;
    this.pending = [];
    this.onStatus('Simulator Stopped');
  }

  private signal(input: PhysicalInput): Signal { return this.signals[input] ?? (() => 0); }

  private entry(input: PhysicalInput, bits: BitDepth) { return this.calibration.entry(input, this.gains.get(input) ?? 0, bits); }

  private quantize(input: PhysicalInput, volts: number, bits: BitDepth): number {
    const { slope, intercept } = this.entry(input, bits);
    return clamp(Math.round((volts - intercept) / slope), 0, topCode(bits));
  }

  private findRisingEdge(input: PhysicalInput, level: number): number {
    const signal = this.signal(input);
    let previous = signal(this.clockUs - this.stepUs);
    for (let t = this.clockUs; t <= this.clockUs + this.horizonUs; t += this.stepUs) {
      const current = signal(t);
      if (previous < level && current >= level) return t;
      previous = current;
    }
    this.onStatus(`No crossing of ${fmt(level, 3)} V on ${input}, auto-triggered`);
    return this.clockUs;
  }
}
