// Shared types for the driver, the HTTP API and its clients

// ============ Result Type ============
// Use Result<T, E> instead of throwing exceptions.
// Try/catch only at boundaries (transport layer wrapping external libs).

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// Helper constructors
export function Ok(): Result<void, never>;
export function Ok<T>(value: T): Result<T, never>;
export function Ok<T>(value?: T): Result<T | undefined, never> {
  return { ok: true, value };
}
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// Async version of a try/catch wrapper
export const tryResultAsync = async <T>(fn: () => Promise<T>): Promise<Result<T, Error>> => {
  try {
    return Ok(await fn());
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
};

// ============ Hardware Types ============

/**
 * Known members of the NanoVNA family.
 * 'unknown' is the state of a session before detection succeeds.
 */
export type HardwareVariant =
  | 'unknown'
  | 'v1'
  | 'vh'
  | 'v2'
  | 'v2plus'
  | 'v2plus4'
  | 'saa2'
  | 'tinysa'
  | 'litevna';

/** S-parameter labels a variant can measure */
export type SParameter = 'S11' | 'S21' | 'S12' | 'S22';

export interface FrequencyRange {
  minHz: number;
  maxHz: number;
}

/**
 * Command dialect of one variant.
 * Templates use named placeholders filled by formatCommand():
 * {start} {stop} {points} for sweep, {port} for data, {slot} for calibration.
 */
export interface CommandSet {
  sweep: string;
  frequencies: string;
  data: string;
  info: string;
  version: string;
  calibrationSave: string;
  calibrationLoad: string;
  /** Text the firmware prints when it is ready for the next command */
  promptMarker: string;
}

export interface HardwareCapabilities {
  hasS21: boolean;
  hasTimeDomain: boolean;
  hasCalibration: boolean;
  hasMultiplePorts: boolean;
  hasGenerator: boolean;
  hasSpectrumMode: boolean;
}

export interface HardwareInfo {
  variant: HardwareVariant;
  frequencyRange: FrequencyRange;
  maxSweepPoints: number;
  supportedPorts: readonly SParameter[];
  commandSet: CommandSet;
  capabilities: HardwareCapabilities;
}

// ============ Measurement Types ============

export interface Complex {
  re: number;
  im: number;
}

export const ZERO_COMPLEX: Complex = Object.freeze({ re: 0, im: 0 });

export interface SweepData {
  frequencies: number[];
  s11: Complex[];
  /** Zero-filled when the hardware has no S21 path */
  s21: Complex[];
}

export interface DeviceInfo {
  model: string;
  firmware: string;
  serialNumber: string;
}

/** Placeholder until calibration transfer is implemented */
export interface CalibrationData {
  slot: number | null;
  coefficients: Record<string, Complex[]>;
}

// ============ Session Types ============

export type VnaSessionState =
  | { readonly status: 'closed' }
  | { readonly status: 'undetected'; readonly variant: 'unknown'; readonly hardware: HardwareInfo }
  | {
      readonly status: 'detected';
      readonly variant: HardwareVariant;
      readonly version: string;
      readonly hardware: HardwareInfo;
    };

// ============ API Types ============

export interface PortListing {
  path: string;
  manufacturer?: string;
}

export interface VnaStatusResponse {
  connected: boolean;
  port: string | null;
  state: VnaSessionState;
}

export interface ApiError {
  error: string;
  message: string;
}
