import type { TelemetryPayload } from '../types/telemetry.types';
import { telemetryPayloadSchema } from '../schemas/telemetry.schemas';
import { PayloadEncodeError } from '../utils/errors';
import type { PayloadEncoder } from './PayloadEncoder';

/**
 * Checks the payload against the wire schema before serializing it, so a
 * malformed datagram never leaves the bridge.
 */
export class SchemaJsonEncoder implements PayloadEncoder {
  readonly name = 'schema';

  // zod is a runtime dependency; this encoder can always run
  isAvailable(): boolean {
    return true;
  }

  encode(payload: TelemetryPayload): Buffer {
    const result = telemetryPayloadSchema.safeParse(payload);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new PayloadEncodeError(`Payload failed validation: ${issues}`, { cause: result.error });
    }
    return Buffer.from(JSON.stringify(payload), 'utf8');
  }
}
