export type FlightLogErrorKind =
  | 'CouldNotOpenFile'
  | 'FileFormatNotRecognized'
  | 'DecompressionFailed';

const MESSAGES: Record<FlightLogErrorKind, string> = {
  CouldNotOpenFile: 'Supplied file could not be opened',
  FileFormatNotRecognized: 'Content of supplied file is not recognized',
  DecompressionFailed: 'Content of supplied file could not be decompressed',
};

// Carries its kind only; the underlying fs, zlib or parser error is not kept.
export class FlightLogError extends Error {
  readonly kind: FlightLogErrorKind;

  constructor(kind: FlightLogErrorKind) {
    super(MESSAGES[kind]);
    this.name = 'FlightLogError';
    this.kind = kind;
  }
}

export function isFlightLogError(err: unknown, kind?: FlightLogErrorKind): err is FlightLogError {
  if (!(err instanceof FlightLogError)) return false;
  return kind === undefined || err.kind === kind;
}
