// Re-export shared types
export * from '../../shared/types.js';

// Import for use in server-only types
import type {
  Result,
  CalibrationData,
  DeviceInfo,
  FrequencyRange,
  HardwareCapabilities,
  HardwareInfo,
  HardwareVariant,
  SParameter,
  SweepData,
  VnaSessionState,
} from '../../shared/types.js';

// Server-only types

export type TransportErrorReason = 'timeout' | 'closed' | 'io';

/** Failure of a single transport call; the channel treats 'timeout' specially */
export class TransportError extends Error {
  public readonly name = 'TransportError';

  constructor(
    public readonly reason: TransportErrorReason,
    message: string
  ) {
    super(message);
  }
}

/**
 * Duplex byte channel to the instrument.
 * Text in, text out; framing and prompt handling live in the command channel.
 */
export interface Transport {
  open(): Promise<Result<void, Error>>;
  close(): Promise<Result<void, Error>>;
  /** Write raw text; resolves with the number of bytes written */
  write(data: string): Promise<Result<number, TransportError>>;
  /** Resolve with whatever has arrived, waiting up to the read timeout for the first byte */
  read(): Promise<Result<string, TransportError>>;
  /** Drop anything received but not yet read */
  discardInput(): Promise<Result<void, TransportError>>;
  isOpen(): boolean;
  describe(): string;
}

export type VnaErrorCode =
  | 'NOT_CONNECTED'
  | 'OUT_OF_RANGE'
  | 'COMMAND_FAILED'
  | 'NO_DATA'
  | 'UNRECOGNIZED_DEVICE'
  | 'NO_DEVICE_FOUND'
  | 'TRANSPORT_ERROR';

export class VnaError extends Error {
  public readonly name = 'VnaError';

  constructor(
    public readonly code: VnaErrorCode,
    message: string,
    public readonly cause?: Error,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      cause: this.cause?.message,
      context: this.context,
    };
  }
}

export interface VnaDriver {
  readonly portPath: string;

  // Lifecycle
  connect(): Promise<Result<void, VnaError>>;
  disconnect(): Promise<Result<void, VnaError>>;
  detect(): Promise<Result<string, VnaError>>;
  forceVariant(variant: HardwareVariant): Result<void, VnaError>;

  // Session / capability queries
  getState(): VnaSessionState;
  getVariant(): HardwareVariant;
  getVersion(): string;
  getHardwareInfo(): HardwareInfo;
  getFrequencyRange(): FrequencyRange;
  getMaxSweepPoints(): number;
  getSupportedPorts(): readonly SParameter[];
  getCapabilities(): HardwareCapabilities;
  isPortSupported(port: string): boolean;
  getPortDetails(): string;

  // Measurement
  configureSweep(startHz: number, stopHz: number, points: number): Promise<Result<void, VnaError>>;
  runSweep(): Promise<Result<SweepData, VnaError>>;
  getInfo(): Promise<Result<DeviceInfo, VnaError>>;

  // Calibration hooks (not implemented by the firmware bridge yet)
  getCalibration(): Promise<Result<CalibrationData, VnaError>>;
  setCalibration(data: CalibrationData): Promise<Result<void, VnaError>>;
  saveCalibration(slot: number): Promise<Result<void, VnaError>>;
  loadCalibration(slot: number): Promise<Result<void, VnaError>>;
}

export type SerialParity = 'none' | 'even' | 'odd' | 'mark' | 'space';

export interface SerialPortConfig {
  path: string;
  baudRate: number;
  dataBits: 5 | 6 | 7 | 8;
  parity: SerialParity;
  stopBits: 1 | 1.5 | 2;
  readTimeoutMs: number;
}
