import * as fs from 'fs';
import * as path from 'path';
import { TextDecoder } from 'util';
import * as zlib from 'zlib';
import { FlightLogError } from './errors';
import { decodeFlightDocument } from './schema';
import type { FlightRecording, LoaderOptions } from './types';

export const COMPRESSED_EXTENSION = 'flygz';

// Dispatch looks at the name only; a gzip file named *.flyg is decoded as text.
export function hasCompressedExtension(filePath: string): boolean {
  const base = path.basename(filePath);
  const dot = base.lastIndexOf('.');
  if (dot < 0) return false;
  return base.slice(dot + 1).toLowerCase() === COMPRESSED_EXTENSION;
}

// A failed close replaces whatever the read produced.
function closeFile(fd: number) {
  try {
    fs.closeSync(fd);
  } catch {
    throw new FlightLogError('CouldNotOpenFile');
  }
}

function readAll(filePath: string): Buffer {
  let fd: number;
  try {
    fd = fs.openSync(filePath, 'r');
  } catch {
    throw new FlightLogError('CouldNotOpenFile');
  }
  try {
    return fs.readFileSync(fd);
  } catch {
    // EISDIR and friends only show up on the first read
    throw new FlightLogError('CouldNotOpenFile');
  } finally {
    closeFile(fd);
  }
}

function gunzip(buf: Buffer): Buffer {
  try {
    return zlib.gunzipSync(buf);
  } catch {
    throw new FlightLogError('DecompressionFailed');
  }
}

function decodeUtf8(buf: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buf);
  } catch {
    throw new FlightLogError('FileFormatNotRecognized');
  }
}

// *.flygz (any case) is gunzipped first unless options.gzip is false.
// Throws FlightLogError only.
export function loadFlightInformationFromFile(filePath: string, options: LoaderOptions = {}): FlightRecording {
  const gzip = options.gzip ?? true;
  const raw = readAll(filePath);
  const bytes = gzip && hasCompressedExtension(filePath) ? gunzip(raw) : raw;
  return decodeFlightDocument(decodeUtf8(bytes));
}
