/**
 * Response Parsers
 *
 * Turn the shell's free-form text into numbers. The firmware echoes the
 * command, prints one value (or one real/imag pair) per line, then the
 * prompt; lines containing "?" are its way of reporting an error.
 */

import type { Complex, DeviceInfo, HardwareVariant, SweepData } from './types.js';
import { ZERO_COMPLEX, VnaError } from './types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { commandToken, hasV2InfoLayout, variantDisplayName } from './registry.js';

const FIRMWARE_ERROR_MARKER = '?';

export interface LineFilter {
  /** Exact echo of the command to drop */
  echo: string;
  promptMarker: string;
  /** Drop lines starting with this token (echo with arguments) */
  skipPrefix?: string;
}

/** Trimmed response lines with blanks, echoes, prompts and error lines removed */
export function responseLines(response: string, filter: LineFilter): string[] {
  return response
    .split('\n')
    .map(line => line.trim())
    .filter(line =>
      line !== '' &&
      line !== filter.echo &&
      !(filter.skipPrefix && line.startsWith(filter.skipPrefix)) &&
      !line.includes(filter.promptMarker) &&
      !line.includes(FIRMWARE_ERROR_MARKER)
    );
}

const DECIMAL_FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOAT = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Strict float parse: the whole token must be a decimal number.
 * Hex, binary and octal literals are rejected; inf, infinity and nan
 * (any case, optionally signed) are accepted.
 */
export function parseFloatStrict(token: string): number | null {
  if (DECIMAL_FLOAT.test(token)) return Number(token);

  const special = SPECIAL_FLOAT.exec(token);
  if (!special) return null;
  if (special[2]?.toLowerCase() === 'nan') return Number.NaN;
  return special[1] === '-' ? -Infinity : Infinity;
}

export function parseFrequencies(response: string, command: string, promptMarker: string): number[] {
  const frequencies: number[] = [];
  for (const line of responseLines(response, { echo: command, promptMarker })) {
    const value = parseFloatStrict(line);
    if (value !== null) frequencies.push(value);
  }
  return frequencies;
}

/** Parse "real imag" lines; extra columns are ignored */
export function parseComplexSamples(response: string, command: string, promptMarker: string): Complex[] {
  const samples: Complex[] = [];
  const lines = responseLines(response, { echo: command, promptMarker, skipPrefix: commandToken(command) });
  for (const line of lines) {
    const parts = line.split(/\s+/);
    if (parts.length < 2) continue;
    const re = parseFloatStrict(parts[0]);
    const im = parseFloatStrict(parts[1]);
    if (re !== null && im !== null) samples.push({ re, im });
  }
  return samples;
}

function padWithZeros(samples: Complex[], length: number): Complex[] {
  const padded = samples.slice(0, Math.max(samples.length, length));
  while (padded.length < length) padded.push(ZERO_COMPLEX);
  return padded;
}

/**
 * Bring the three arrays to one length: S21 padded to S11, then everything
 * cut to the shorter of frequencies and S11.
 */
export function reconcileSweep(
  frequencies: number[],
  s11: Complex[],
  s21: Complex[]
): Result<SweepData, VnaError> {
  const paddedS21 = padWithZeros(s21, s11.length);

  if (frequencies.length === 0 || s11.length === 0) {
    return Err(new VnaError('NO_DATA', 'No valid measurement data received', undefined, {
      frequencies: frequencies.length,
      s11: s11.length,
    }));
  }

  const length = Math.min(frequencies.length, s11.length);
  return Ok({
    frequencies: frequencies.slice(0, length),
    s11: s11.slice(0, length),
    s21: padWithZeros(paddedS21.slice(0, length), length),
  });
}

export function zeroSamples(count: number): Complex[] {
  return padWithZeros([], count);
}

/**
 * Best-effort model/firmware/serial extraction from an `info` banner.
 */
export function parseDeviceInfo(
  response: string,
  variant: HardwareVariant,
  infoCommand: string,
  promptMarker: string
): DeviceInfo {
  const displayName = variantDisplayName(variant);
  const info: DeviceInfo = { model: displayName, firmware: '', serialNumber: '' };

  const lines = response
    .split('\n')
    .map(line => line.trim())
    .filter(line => line !== '' && line !== infoCommand && !line.includes(promptMarker));

  for (const line of lines) {
    const lower = line.toLowerCase();

    if (hasV2InfoLayout(variant)) {
      if (lower.includes('nanovna') || lower.includes('saa2')) {
        info.model = line;
      }
      if (lower.includes('firmware') || lower.includes('version')) {
        const parts = line.split(':');
        if (parts.length >= 2) info.firmware = parts[1].trim();
      }
      continue;
    }

    // First banner line names the board
    if (info.model === displayName) {
      info.model = line;
    }

    if (lower.startsWith('serial')) {
      info.serialNumber = line.replace(/^Serial:/, '').trim();
    }

    if (info.firmware === '' && line.includes('v')) {
      const token = line.split(/\s+/).find(p => p.startsWith('v') && p.length > 1);
      if (token) info.firmware = token;
    }
  }

  if (info.model === '' || info.model === displayName) {
    info.model = `${displayName} (detected)`;
  }

  return info;
}
