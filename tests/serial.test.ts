import { MockBinding } from '@serialport/binding-mock';
import { SerialPortStream } from '@serialport/stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { TransportError } from '../src/errors';
import { SerialTransport, encodeCommand, parseSamples } from '../src/serial';
import { DeviceSession } from '../src/session';

const PATH = '/dev/ttyMOCK0';

const openPort = () => new SerialPortStream({ binding: MockBinding, path: PATH, baudRate: 1000000, autoOpen: false });

const lastLine = (port: ReturnType<typeof openPort>) => port.port?.lastWrite?.toString();

describe('encodeCommand', () => {
  it('encodes gain writes with the multiplexer number', () => {
    expect(encodeCommand({ kind: 'set-range', input: 'CH1', gainIndex: 5 })).toBe('R 3 5');
    expect(encodeCommand({ kind: 'set-range', input: 'CH2', gainIndex: 0 })).toBe('R 0 0');
  });

  it('encodes captures in clock ticks', () => {
    expect(encodeCommand({ kind: 'capture', inputs: ['CH1', 'CH2'], samples: 500, timegapUs: 2, bitDepth: 10, trigger: { slot: 2, threshold: 256 } }))
      .toBe('C 3,0 500 16 10 2 256');
    expect(encodeCommand({ kind: 'capture', inputs: ['CAP'], samples: 100, timegapUs: 0.5, bitDepth: 12, trigger: null }))
      .toBe('C 5 100 4 12 - 0');
  });
});

describe('parseSamples', () => {
  it('parses a comma separated block', () => {
    expect(parseSamples('1,2,3', 3)).toEqual([1, 2, 3]);
  });

  it('rejects malformed, short and error lines', () => {
    expect(() => parseSamples('1,x,3', 3)).toThrow(TransportError);
    expect(() => parseSamples('1,2', 3)).toThrow('Expected 3 samples, received 2.');
    expect(() => parseSamples('E buffer overrun', 3)).toThrow('Device error: buffer overrun');
  });
});

describe('SerialTransport', () => {
  beforeEach(() => {
    MockBinding.createPort(PATH, { echo: false, record: true, readyData: Buffer.from('\n') });
  });

  afterEach(() => {
    MockBinding.reset();
  });

  it('refuses to write before the port is open', async () => {
    const transport = new SerialTransport({ port: openPort() });
    await expect(transport.sendCommand({ kind: 'set-range', input: 'CH1', gainIndex: 1 })).rejects.toThrow('Port not open');
  });

  it('writes one line per command', async () => {
    const port = openPort();
    const transport = new SerialTransport({ port });
    await transport.connect();
    await transport.sendCommand({ kind: 'set-range', input: 'CH2', gainIndex: 3 });
    expect(lastLine(port)).toBe('R 0 3\n');
    await transport.close();
  });

  it('reads a block of codes after a fetch', async () => {
    const port = openPort();
    const transport = new SerialTransport({ port });
    await transport.connect();
    const pending = transport.readSamples(3, 10);
    await vi.waitFor(() => expect(lastLine(port)).toBe('F 3\n'));
    port.port?.emitData(Buffer.from('12,1023,0\n'));
    await expect(pending).resolves.toEqual([12, 1023, 0]);
    await transport.close();
  });

  it('rejects codes wider than the bit depth', async () => {
    const port = openPort();
    const transport = new SerialTransport({ port });
    await transport.connect();
    const pending = transport.readSamples(3, 10);
    await vi.waitFor(() => expect(lastLine(port)).toBe('F 3\n'));
    port.port?.emitData(Buffer.from('12,2000,0\n'));
    await expect(pending).rejects.toBeInstanceOf(TransportError);
    await transport.close();
  });

  it('times out when the device stays silent', async () => {
    const port = openPort();
    const transport = new SerialTransport({ port });
    await transport.connect();
    await expect(transport.readSamples(2, 12, { timeoutMs: 20 })).rejects.toThrow('No response from device within 20 ms');
    await transport.close();
  });

  it('ignores a reply that arrives after its read timed out', async () => {
    const port = openPort();
    const transport = new SerialTransport({ port });
    await transport.connect();
    await expect(transport.readSamples(3, 10, { timeoutMs: 10 })).rejects.toThrow('No response from device within 10 ms');
    port.port?.emitData(Buffer.from('1,2,3\n'));
    await new Promise((resolve) => setTimeout(resolve, 20));

    const pending = transport.readSamples(3, 10, { timeoutMs: 1000 });
    await vi.waitFor(() => expect(port.port?.recording.toString()).toBe('F 3\nF 3\n'));
    port.port?.emitData(Buffer.from('4,5,6\n'));
    await expect(pending).resolves.toEqual([4, 5, 6]);
    await transport.close();
  });

  it('rejects a pending read when the port reports an error', async () => {
    const port = openPort();
    const onStatus = vi.fn();
    const transport = new SerialTransport({ port });
    transport.onStatus = onStatus;
    await transport.connect();
    const pending = transport.readSamples(3, 10);
    await vi.waitFor(() => expect(lastLine(port)).toBe('F 3\n'));
    await new Promise((resolve) => setTimeout(resolve, 10));
    port.emit('error', new Error('unplugged'));
    await expect(pending).rejects.toThrow('Serial port error: unplugged');
    await expect(pending).rejects.toBeInstanceOf(TransportError);
    expect(onStatus).toHaveBeenCalledWith('Port error: unplugged');
    await transport.close();
  });

  it('closes the port', async () => {
    const port = openPort();
    const onStatus = vi.fn();
    const transport = new SerialTransport({ port });
    transport.onStatus = onStatus;
    await transport.connect();
    await transport.close();
    expect(port.isOpen).toBe(false);
    expect(onStatus).toHaveBeenLastCalledWith('Disconnected');
  });

  it('drives a full capture through a session', async () => {
    const port = openPort();
    const session = new DeviceSession({ transport: new SerialTransport({ port }), readTimeoutMs: 1000 });
    await session.connect();
    const pending = session.capture(1, 3, 1);
    await vi.waitFor(() => expect(lastLine(port)).toBe('F 3\n'));
    expect(port.port?.recording.toString()).toBe('C 3 3 8 12 - 0\nF 3\n');
    port.port?.emitData(Buffer.from('0,4095,4095\n'));
    const result = await pending;
    expect(result.voltages[0][0]).toBe(16.5);
    expect(result.voltages[0][1]).toBeCloseTo(-16.5, 10);
    expect(Array.from(result.timeUs)).toEqual([0, 1, 2]);
    await session.close();
  });
});
