import { describe, expect, it } from 'vitest';

import { ChannelRegistry } from '../src/channels';
import { DeviceRangeError, TypeMismatchError } from '../src/errors';
import { TriggerController } from '../src/trigger';

const setup = () => {
  const registry = new ChannelRegistry();
  return { registry, trigger: new TriggerController(registry) };
};

describe('TriggerController', () => {
  it('starts disarmed on CH1 at 0 V', () => {
    const { trigger } = setup();
    expect(trigger.state).toEqual({ enabled: false, input: 'CH1', level: 0 });
    expect(trigger.sourceFor(['CH1'])).toBeNull();
  });

  it('arms on configure and resolves the slot to watch', () => {
    const { trigger } = setup();
    trigger.configure('CH2', 1);
    expect(trigger.state).toEqual({ enabled: true, input: 'CH2', level: 1 });
    expect(trigger.sourceFor(['CH1', 'CH2'])).toEqual({ slot: 2, input: 'CH2', level: 1 });
  });

  it('triggers on an input reached through the channel one map', () => {
    const { registry, trigger } = setup();
    registry.remap(1, 'CH3');
    trigger.configure('CH3', 1.5);
    expect(trigger.sourceFor(['CH3'])).toEqual({ slot: 1, input: 'CH3', level: 1.5 });
  });

  it('rejects names that are not analog inputs', () => {
    const { trigger } = setup();
    expect(() => trigger.configure('AN8', 1.5)).toThrow(TypeMismatchError);
    expect(() => trigger.configure('AN8', 1.5)).toThrow(TypeError);
  });

  it('rejects CH1 once channel one is remapped and keeps the old configuration', () => {
    const { registry, trigger } = setup();
    trigger.configure('CH2', 1);
    registry.remap(1, 'CAP');
    expect(() => trigger.configure('CH1', 1.5)).toThrow(TypeMismatchError);
    expect(() => trigger.configure('CAP', 1.5)).toThrow(TypeMismatchError);
    expect(trigger.state).toEqual({ enabled: true, input: 'CH2', level: 1 });
  });

  it('re-checks routing when a capture is planned', () => {
    const { registry, trigger } = setup();
    trigger.configure('CH1', 0);
    registry.remap(1, 'CAP');
    expect(() => trigger.sourceFor(['CAP'])).toThrow(TypeMismatchError);
  });

  it('requires the trigger input to be captured', () => {
    const { trigger } = setup();
    trigger.configure('CH2', 0);
    expect(() => trigger.sourceFor(['CH1'])).toThrow(TypeMismatchError);
  });

  it('toggles arming without losing the configuration', () => {
    const { trigger } = setup();
    trigger.configure('MIC', -0.5);
    trigger.disable();
    expect(trigger.sourceFor(['CH1', 'CH2', 'CH3', 'MIC'])).toBeNull();
    trigger.enable();
    expect(trigger.sourceFor(['CH1', 'CH2', 'CH3', 'MIC'])).toEqual({ slot: 4, input: 'MIC', level: -0.5 });
  });

  it('rejects non-finite levels', () => {
    const { trigger } = setup();
    expect(() => trigger.configure('CH1', Number.NaN)).toThrow(DeviceRangeError);
    expect(trigger.state.enabled).toBe(false);
  });
});
