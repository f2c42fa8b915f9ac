import { keysToCamel } from './casing';
import { isFlightLogError } from './errors';
import { loadFlightInformationFromFile } from './loader';
import type { FlightRecording } from './types';

export interface CliArgs {
  file?: string;
  json: boolean;
  gzip: boolean;
}

export function usage() {
  console.error('Usage:');
  console.error('  Summary: flyglog <flight log> [--no-gzip]');
  console.error('  JSON:    flyglog <flight log> --json [--no-gzip]');
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const flags = argv.filter(a => a.startsWith('-'));
  const args = argv.filter(a => !a.startsWith('-'));
  return {
    file: args[0],
    json: flags.includes('--json'),
    gzip: !flags.includes('--no-gzip'),
  };
}

export const SUMMARY_HEADER = [
  'NAME', 'ENGINES', 'FUEL CAP (gal)', 'LANDING SPEED (ft/s)',
  'BLOCK OFF', 'TAKEOFF', 'LANDING', 'BLOCK ON', 'FUEL RECORDS', 'FUEL Start-End (gal)',
].join('\t');

export function formatSummary(rec: FlightRecording): string {
  const p = rec.plane_information;
  const t = rec.times;
  const fuel = rec.fuel_records;
  const fuelSpan = fuel.length
    ? `${fuel[0].fuel_quantity.toFixed(1)}-${fuel[fuel.length - 1].fuel_quantity.toFixed(1)}`
    : 'NA-NA';
  const row = [
    p.name, String(p.number_of_engines), String(p.fuel_capacity), rec.landing_speed.toFixed(1),
    t.block_off_time, t.takeoff_time, t.landing_time, t.block_on_time, String(fuel.length), fuelSpan,
  ].join('\t');
  return `${SUMMARY_HEADER}\n${row}`;
}

// Same keys as the document on disk.
export function formatJson(rec: FlightRecording): string {
  return JSON.stringify(keysToCamel(rec), null, 2);
}

export function main(argv: readonly string[]): number {
  const { file, json, gzip } = parseArgs(argv);
  if (!file) {
    usage();
    return 1;
  }
  let rec: FlightRecording;
  try {
    rec = loadFlightInformationFromFile(file, { gzip });
  } catch (err) {
    if (!isFlightLogError(err)) throw err;
    console.error(`flyglog: ${err.message} (${err.kind})`);
    return 2;
  }
  console.log(json ? formatJson(rec) : formatSummary(rec));
  return 0;
}
