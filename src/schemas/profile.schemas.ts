import { z } from 'zod';

const signalValue = z.union([z.number(), z.array(z.number())]);

export const keyframeValuesSchema = z.object({
  onGround: signalValue.optional(),
  engineRunning: signalValue.optional(),
  paused: signalValue.optional(),
  groundSpeed: signalValue.optional(),
  indicatedAirspeed: signalValue.optional(),
  verticalSpeed: signalValue.optional(),
  radioAltitude: signalValue.optional(),
  altitudeAgl: signalValue.optional(),
  flightTime: signalValue.optional(),
  heading: signalValue.optional(),
  distance: signalValue.optional(),
  fuelQuantity: signalValue.optional(),
  latitude: signalValue.optional(),
  longitude: signalValue.optional(),
  elevation: signalValue.optional(),
}).strict();

export const flightProfileSchema = z.object({
  name: z.string().min(1),
  keyframes: z.array(z.object({
    atSec: z.number().min(0),
    values: keyframeValuesSchema,
  })).min(1),
}).refine(
  (profile) => profile.keyframes.every((frame, i, frames) => i === 0 || frame.atSec > frames[i - 1].atSec),
  { message: 'keyframes must be in strictly increasing atSec order' },
);

export type FlightProfile = z.infer<typeof flightProfileSchema>;
