// Field names follow the snake_case of the recorded data model; documents on disk
// carry the same fields in lowerCamelCase (see casing.ts).

export interface FlightRecording {
  readonly plane_information: PlaneInformation;
  readonly landing_speed: number; // feet per second at touch down
  readonly times: Times;
  readonly fuel_records: readonly FuelRecord[]; // in sampling order
}

export interface PlaneInformation {
  readonly name: string; // as reported by the simulator
  readonly fuel_capacity: number; // gallons, u32
  readonly number_of_engines: number; // u8
  readonly fuel_weight: number; // pounds per gallon
  readonly unusable_fuel_quantity: number; // gallons
}

// Block off = first movement, block on = final stop with engines off. Order is not checked.
export interface Times {
  readonly block_off_time: string;
  readonly takeoff_time: string;
  readonly landing_time: string;
  readonly block_on_time: string;
}

export interface FuelRecord {
  readonly fuel_quantity: number; // gallons remaining
}

export interface LoaderOptions {
  // Set to false to treat compressed-extension files as plain documents.
  gzip?: boolean;
}
