import type { TelemetryPayload } from '../types/telemetry.types';

export type EncoderPreference = 'auto' | 'schema' | 'minimal';

/**
 * Serializes a telemetry payload to datagram bytes. Implementations throw
 * `PayloadEncodeError` when a value cannot be represented.
 */
export interface PayloadEncoder {
  readonly name: Exclude<EncoderPreference, 'auto'>;
  isAvailable(): boolean;
  encode(payload: TelemetryPayload): Buffer;
}
