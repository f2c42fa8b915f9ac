// Flight log loader: .flyg documents, optionally gzipped as .flygz

export { loadFlightInformationFromFile, hasCompressedExtension, COMPRESSED_EXTENSION } from './loader';
export { FlightLogError, isFlightLogError } from './errors';
export type { FlightLogErrorKind } from './errors';
export { camelToSnake, snakeToCamel, keysToCamel, keysToSnake } from './casing';
export type {
  FlightRecording,
  PlaneInformation,
  Times,
  FuelRecord,
  LoaderOptions,
} from './types';
