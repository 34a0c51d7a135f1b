import type { BitDepth, ChannelCount, DeviceProfile, PhysicalInput } from './types';

export const PHYSICAL_INPUTS = ['CH1', 'CH2', 'CH3', 'MIC', 'CAP', 'RES', 'VOL', 'AN4'] as const satisfies readonly PhysicalInput[];

export const RESOLUTION_BY_CHANNELS: Record<ChannelCount, BitDepth> = { 1: 12, 2: 10, 3: 10, 4: 10 };

export const PGA_GAINS = [1, 2, 4, 5, 8, 10, 16, 32] as const;

export const DEFAULT_PROFILE: DeviceProfile = {
  inputs: PHYSICAL_INPUTS,
  channelOneOptions: PHYSICAL_INPUTS,
  fixedSlots: { 2: 'CH2', 3: 'CH3', 4: 'MIC' },
  triggerable: ['CH1', 'CH2', 'CH3', 'MIC'],
  multiplexer: { CH1: 3, CH2: 0, CH3: 1, MIC: 2, AN4: 4, CAP: 5, RES: 7, VOL: 8 },
  // CH1/CH2 front ends are inverting: raw 0 reads the positive end.
  spans: {
    CH1: { low: 16.5, high: -16.5 },
    CH2: { low: 16.5, high: -16.5 },
    CH3: { low: -3.3, high: 3.3 },
    MIC: { low: -3.3, high: 3.3 },
    CAP: { low: 0, high: 3.3 },
    RES: { low: 0, high: 3.3 },
    VOL: { low: 0, high: 3.3 },
    AN4: { low: 0, high: 3.3 },
  },
  gains: { CH1: PGA_GAINS, CH2: PGA_GAINS },
  limits: {
    maxSamples: 10000,
    minTimegapUs: { 1: 0.5, 2: 0.875, 3: 1.75, 4: 1.75 },
  },
  clockTicksPerUs: 8,
};

/*
    Slot layout.
    Slot 1 follows the channel one map and may be pointed at any analog input; slots 2..4 are
    hard-wired. Only the four front-end inputs can source a trigger.

      Slot      Default      Remappable      ADC mux
        1  ----->  CH1  -----> any input ---> per input
        2  ----->  CH2  -----> no        ---> 0
        3  ----->  CH3  -----> no        ---> 1
        4  ----->  MIC  -----> no        ---> 2
*/
