export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Startup configuration is unusable. Fatal before anything listens. */
export class ConfigurationError extends AppError {
  constructor(readonly issues: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${issues.join('; ')}`);
  }
}

/** A frame source cannot produce frames (missing directory, no files, failed encode). */
export class SourceUnavailable extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super('SOURCE_UNAVAILABLE', message, options);
  }
}

/** A send to one subscriber failed. Handled by detaching that subscriber only. */
export class TransportFailure extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super('TRANSPORT_FAILURE', message, options);
  }
}

export class ProtocolError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super('PROTOCOL_ERROR', message, options);
  }
}
