import { describe, expect, it } from 'vitest';

import { ChannelRegistry, isPhysicalInput } from '../src/channels';
import { InvalidChannelError } from '../src/errors';

describe('ChannelRegistry', () => {
  it('resolves the default slot layout', () => {
    const registry = new ChannelRegistry();
    expect(registry.resolve(1)).toBe('CH1');
    expect(registry.resolve(2)).toBe('CH2');
    expect(registry.resolve(3)).toBe('CH3');
    expect(registry.resolve(4)).toBe('MIC');
    expect(registry.assigned()).toEqual(['CH1', 'CH2', 'CH3', 'MIC']);
  });

  it('remaps channel one to any allowed input', () => {
    const registry = new ChannelRegistry();
    registry.remap(1, 'CAP');
    expect(registry.resolve(1)).toBe('CAP');
    expect(registry.channelOneMap).toBe('CAP');
    expect(registry.slotsOf('CAP')).toEqual([1]);
    expect(registry.slotsOf('CH1')).toEqual([]);

    registry.remap(1, 'CH3');
    expect(registry.slotsOf('CH3')).toEqual([1, 3]);
    expect(registry.assigned()).toEqual(['CH3', 'CH2', 'CH3', 'MIC']);
  });

  it('rejects unknown names and keeps the previous mapping', () => {
    const registry = new ChannelRegistry();
    registry.remap(1, 'MIC');
    expect(() => registry.remap(1, 'BAD')).toThrow(InvalidChannelError);
    expect(registry.resolve(1)).toBe('MIC');
  });

  it('only lets slot one be remapped', () => {
    const registry = new ChannelRegistry();
    expect(() => registry.remap(2, 'CH1')).toThrow(InvalidChannelError);
    expect(registry.resolve(2)).toBe('CH2');
  });

  it('narrows input names', () => {
    expect(isPhysicalInput('VOL')).toBe(true);
    expect(isPhysicalInput('AN8')).toBe(false);
    expect(isPhysicalInput('ch1')).toBe(false);
  });
});
