/**
 * Error types raised inside the bridge. None of them escape `TelemetryBridge.tick`;
 * they exist so callers and logs can tell the failure modes apart.
 */
export class BridgeError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BridgeError';
    this.code = code;
  }
}

export class PayloadEncodeError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ENCODE_FAILED', options);
    this.name = 'PayloadEncodeError';
  }
}

export class TransportError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'TRANSPORT_FAILED', options);
    this.name = 'TransportError';
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

export const errorMessage = (error: unknown): string => (
  error instanceof Error ? error.message : String(error)
);

export const errorCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};
