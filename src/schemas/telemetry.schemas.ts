import { z } from 'zod';

export const wireCodeSchema = z.enum(['PSD', 'BST', 'TXI', 'TOF', 'ENR', 'TEN', 'LDG', 'ARR']);

const simTimeSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/, 'sim_time must be UTC ISO-8601 ending in Z');

export const telemetryPositionSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  altitude_msl: z.number().int(),
  altitude_agl: z.number().int().min(0),
  gs: z.number().int(),
  ias: z.number().int().min(0),
  vs: z.number().int(),
  heading: z.number().int().min(0).max(359),
  distance: z.number().int().min(0),
  sim_time: simTimeSchema,
});

export const telemetryPayloadSchema = z.object({
  status: wireCodeSchema,
  position: telemetryPositionSchema,
  fuel: z.number().int(),
  flight_time: z.number().int().min(0),
});

export const telemetryEventSchema = z.object({
  log: z.string().min(1).max(512),
  sim_time: z.union([z.string(), z.number()]).optional(),
});

/** What the ground-side receiver accepts: the bridge payload plus optional log events. */
export const receivedTelemetrySchema = telemetryPayloadSchema.extend({
  events: z.array(telemetryEventSchema).max(100).optional(),
});

export type ReceivedTelemetry = z.infer<typeof receivedTelemetrySchema>;
export type TelemetryEvent = z.infer<typeof telemetryEventSchema>;
