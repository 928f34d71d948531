/**
 * Socket, bind or listen failure while bringing a listener up.
 * The process cannot continue without the listener.
 */
export class SetupError extends Error {
  readonly code?: string;

  constructor(message: string, code?: string) {
    super(message);
    this.name = 'SetupError';
    this.code = code;
  }
}

/**
 * The readiness wait could not produce fresh readiness information.
 */
export class MultiplexerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MultiplexerError';
  }
}

/**
 * The hello exchange ended before a complete, well-formed message arrived.
 */
export class HandshakeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HandshakeError';
  }
}

/**
 * Render an unknown thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
