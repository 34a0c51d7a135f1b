export class InvalidChannelError extends Error {
  readonly channel: string;

  constructor(channel: string, customMessage?: string) {
    super(customMessage ?? `Invalid channel "${channel}".`);
    this.name = 'InvalidChannelError';
    this.channel = channel;
  }
}

/** The channel name is well-formed but cannot serve the requested role under the current mapping. */
export class TypeMismatchError extends TypeError {
  readonly channel: string;

  constructor(channel: string, customMessage?: string) {
    super(customMessage ?? `Channel "${channel}" cannot be used here.`);
    this.name = 'TypeMismatchError';
    this.channel = channel;
  }
}

export type DeviceRangeReason =
  | 'too-many-channels'
  | 'too-many-samples'
  | 'invalid-sample-count'
  | 'timegap-too-small'
  | 'range-unsupported'
  | 'level-out-of-range';

export class DeviceRangeError extends RangeError {
  readonly reason: DeviceRangeReason;

  constructor(reason: DeviceRangeReason, message: string) {
    super(message);
    this.name = 'DeviceRangeError';
    this.reason = reason;
  }
}

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}
