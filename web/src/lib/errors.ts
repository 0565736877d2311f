/** A frame reference that could not be fetched, decoded or drawn. */
export class DecodeFailure extends Error {
  constructor(
    readonly path: string,
    options?: ErrorOptions,
  ) {
    super(`Could not render frame ${path}`, options);
    this.name = 'DecodeFailure';
  }
}

export class MessageFormatError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MessageFormatError';
  }
}
