import { describe, it, expect } from 'vitest';
import { isFlightLogError } from './errors';
import { decodeFlightDocument } from './schema';

const plane = { name: 'Piper PA-28', fuelCapacity: 48, numberOfEngines: 1 };
const times = { blockOffTime: 'a', takeoffTime: 'b', landingTime: 'c', blockOnTime: 'd' };

function doc(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({ planeInformation: plane, landingSpeed: 3, times, ...overrides });
}

function rejects(text: string): boolean {
  try {
    decodeFlightDocument(text);
  } catch (err) {
    return isFlightLogError(err, 'FileFormatNotRecognized');
  }
  return false;
}

describe('decodeFlightDocument', () => {
  it('decodes a minimal document', () => {
    expect(decodeFlightDocument(doc())).toEqual({
      plane_information: {
        name: 'Piper PA-28',
        fuel_capacity: 48,
        number_of_engines: 1,
        fuel_weight: 0,
        unusable_fuel_quantity: 0,
      },
      landing_speed: 3,
      times: { block_off_time: 'a', takeoff_time: 'b', landing_time: 'c', block_on_time: 'd' },
      fuel_records: [],
    });
  });

  it('ignores unknown keys', () => {
    const rec = decodeFlightDocument(doc({ simulator: 'x' }));
    expect(rec).not.toHaveProperty('simulator');
  });

  it('does not check the order of times', () => {
    const reversed = { blockOffTime: '12:00', takeoffTime: '11:00', landingTime: '10:00', blockOnTime: '09:00' };
    expect(decodeFlightDocument(doc({ times: reversed })).times.block_on_time).toBe('09:00');
  });

  it('accepts the full numeric range of the stored types', () => {
    const rec = decodeFlightDocument(doc({
      planeInformation: { ...plane, fuelCapacity: 4294967295, numberOfEngines: 255 },
    }));
    expect(rec.plane_information.fuel_capacity).toBe(4294967295);
    expect(rec.plane_information.number_of_engines).toBe(255);
  });

  it.each([
    ['empty text', ''],
    ['malformed JSON', '{"planeInformation": '],
    ['a top-level array', '[]'],
    ['a top-level string', '"flight"'],
    ['a missing landing speed', JSON.stringify({ planeInformation: plane, times })],
    ['a string landing speed', doc({ landingSpeed: '3' })],
    ['a negative fuel capacity', doc({ planeInformation: { ...plane, fuelCapacity: -1 } })],
    ['a fractional fuel capacity', doc({ planeInformation: { ...plane, fuelCapacity: 1.5 } })],
    ['a fuel capacity above u32', doc({ planeInformation: { ...plane, fuelCapacity: 4294967296 } })],
    ['too many engines', doc({ planeInformation: { ...plane, numberOfEngines: 256 } })],
    ['a fuel record without quantity', doc({ fuelRecords: [{}] })],
    ['fuel records that are not a list', doc({ fuelRecords: { fuelQuantity: 1 } })],
  ])('rejects %s', (_, text) => {
    expect(rejects(text)).toBe(true);
  });
});
