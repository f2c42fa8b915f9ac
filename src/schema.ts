import { z } from 'zod';
import { keysToSnake } from './casing';
import { FlightLogError } from './errors';
import type { FlightRecording } from './types';

const U32_MAX = 0xffffffff;
const U8_MAX = 0xff;

const PlaneInformationSchema = z.object({
  name: z.string(),
  fuel_capacity: z.number().int().min(0).max(U32_MAX),
  number_of_engines: z.number().int().min(0).max(U8_MAX),
  fuel_weight: z.number().finite().default(0),
  unusable_fuel_quantity: z.number().finite().default(0),
});

const TimesSchema = z.object({
  block_off_time: z.string(),
  takeoff_time: z.string(),
  landing_time: z.string(),
  block_on_time: z.string(),
});

const FuelRecordSchema = z.object({
  fuel_quantity: z.number().finite(),
});

const FlightRecordingSchema = z.object({
  plane_information: PlaneInformationSchema,
  landing_speed: z.number().finite(),
  times: TimesSchema,
  fuel_records: z.array(FuelRecordSchema).default([]),
}) satisfies z.ZodType<FlightRecording, z.ZodTypeDef, unknown>;

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new FlightLogError('FileFormatNotRecognized');
  }
}

// Any syntax or shape problem surfaces as FileFormatNotRecognized.
export function decodeFlightDocument(text: string): FlightRecording {
  const parsed = FlightRecordingSchema.safeParse(keysToSnake(parseJson(text)));
  if (!parsed.success) throw new FlightLogError('FileFormatNotRecognized');
  return parsed.data;
}
