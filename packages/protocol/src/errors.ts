/**
 * Protocol Error Classes
 *
 * Decoding throws InvalidFrameError or UnsupportedVersionError. Encoding
 * never throws; it hands back an InvalidMessageError in EncodedFrame.error.
 */

export class ProtocolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProtocolError";
  }
}

/**
 * The received bytes are not a frame this codec can read
 */
export class InvalidFrameError extends ProtocolError {
  constructor(
    message: string,
    public readonly frameSize: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "InvalidFrameError";
  }
}

export class UnsupportedVersionError extends ProtocolError {
  constructor(
    public readonly version: number,
    public readonly frameSize: number
  ) {
    super(`Unsupported protocol version: ${version}`);
    this.name = "UnsupportedVersionError";
  }
}

/**
 * The message cannot be put on the wire; nothing is sent for it
 */
export class InvalidMessageError extends ProtocolError {
  constructor(message: string, public readonly kind: number) {
    super(message);
    this.name = "InvalidMessageError";
  }
}
