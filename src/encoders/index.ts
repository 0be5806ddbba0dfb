import logger from '../utils/logger';
import { MinimalJsonEncoder } from './MinimalJsonEncoder';
import type { EncoderPreference, PayloadEncoder } from './PayloadEncoder';
import { SchemaJsonEncoder } from './SchemaJsonEncoder';

export type { EncoderPreference, PayloadEncoder } from './PayloadEncoder';
export { MinimalJsonEncoder, encodeJsonValue, escapeJsonString } from './MinimalJsonEncoder';
export { SchemaJsonEncoder } from './SchemaJsonEncoder';

/**
 * Pick the encoder once at startup. `auto` takes the first available
 * candidate; the minimal encoder always closes the chain.
 */
export function selectEncoder(
  preference: EncoderPreference,
  candidates: readonly PayloadEncoder[] = [new SchemaJsonEncoder()],
): PayloadEncoder {
  const minimal = new MinimalJsonEncoder();
  const chain = [...candidates, minimal];

  const selected = preference === 'auto'
    ? chain.find((encoder) => encoder.isAvailable())
    : chain.find((encoder) => encoder.name === preference && encoder.isAvailable());

  if (!selected) {
    logger.warn('Requested payload encoder unavailable, using minimal encoder', { preference });
    return minimal;
  }

  logger.info('Payload encoder selected', { preference, encoder: selected.name });
  return selected;
}
