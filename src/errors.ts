export class EncodingError extends Error {
  override name = 'EncodingError';
}

/** Raised by the throwing entry points when a type encoding cannot be decoded. */
export class MalformedEncodingError extends EncodingError {
  override name = 'MalformedEncodingError';

  constructor(
    readonly input: string,
    readonly offset: number,
    detail?: string,
  ) {
    super(
      `Malformed type encoding at offset ${offset}: ${JSON.stringify(input)}` +
        (detail ? ` (${detail})` : ''),
    );
  }
}

export class UnsupportedLayoutError extends EncodingError {
  override name = 'UnsupportedLayoutError';

  constructor(readonly encoding: string, reason: string) {
    super(`No native layout for ${JSON.stringify(encoding)}: ${reason}`);
  }
}

export class ConfigError extends EncodingError {
  override name = 'ConfigError';
}
