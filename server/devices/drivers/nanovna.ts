/**
 * NanoVNA-family Driver
 * Implements the VnaDriver interface for every text-shell variant
 *
 * Session lifecycle:
 *   closed --connect--> undetected --detect/forceVariant--> detected
 *   any --disconnect--> closed
 * A failed detect() drops back to undetected with conservative defaults.
 *
 * Commands are sent through a CommandChannel; the active HardwareInfo decides
 * dialect, prompt marker and limits.
 */

import type {
  CalibrationData,
  Complex,
  DeviceInfo,
  FrequencyRange,
  HardwareCapabilities,
  HardwareInfo,
  HardwareVariant,
  SParameter,
  SweepData,
  Transport,
  VnaDriver,
  VnaSessionState,
} from '../types.js';
import { VnaError } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { createCommandChannel, type ChannelTiming } from '../command-channel.js';
import {
  formatCommand,
  isPortSupported,
  isV2Family,
  lookupHardware,
  variantDisplayName,
  versionLabelFor,
} from '../registry.js';
import { detectVariant } from '../variant-detector.js';
import {
  parseComplexSamples,
  parseDeviceInfo,
  parseFrequencies,
  reconcileSweep,
  zeroSamples,
} from '../sweep-parser.js';

export interface NanoVnaDriverOptions {
  /** Identifier shown in logs and API responses (serial path, "sim:v1", ...) */
  portPath?: string;
  timing?: Partial<ChannelTiming>;
}

const S11_PORT_INDEX = 0;
const S21_PORT_INDEX = 1;

const CLOSED: VnaSessionState = Object.freeze({ status: 'closed' });

export function createNanoVnaDriver(transport: Transport, options: NanoVnaDriverOptions = {}): VnaDriver {
  const portPath = options.portPath ?? transport.describe();
  const channel = createCommandChannel({ timing: options.timing });

  let state: VnaSessionState = CLOSED;

  // getState() returns the live object; keep it frozen
  function setState(next: VnaSessionState): void {
    state = Object.freeze(next);
  }

  function hardware(): HardwareInfo {
    return state.status === 'closed' ? lookupHardware('unknown') : state.hardware;
  }

  function variant(): HardwareVariant {
    return state.status === 'closed' ? 'unknown' : state.variant;
  }

  function enterUndetected(): void {
    const defaults = lookupHardware('unknown');
    setState({ status: 'undetected', variant: 'unknown', hardware: defaults });
    channel.setPromptMarker(defaults.commandSet.promptMarker);
  }

  function enterDetected(detected: HardwareVariant, version: string): void {
    const info = lookupHardware(detected);
    setState({ status: 'detected', variant: detected, version, hardware: info });
    channel.setPromptMarker(info.commandSet.promptMarker);
  }

  function requireOpen(): Result<HardwareInfo, VnaError> {
    if (state.status === 'closed') {
      return Err(new VnaError('NOT_CONNECTED', 'Device not open'));
    }
    return Ok(state.hardware);
  }

  async function trySend(command: string): Promise<boolean> {
    const result = await channel.exchange(command);
    return result.ok;
  }

  // Scoped fallback commands when the one-shot sweep command is rejected
  function fallbackCommands(startHz: number, stopHz: number, points: number): string[] {
    const params = { start: startHz, stop: stopHz, points };
    const templates = isV2Family(variant())
      ? ['sweep start {start}', 'sweep stop {stop}', 'sweep points {points}']
      : ['start {start}', 'stop {stop}', 'points {points}'];
    return templates.map(t => formatCommand(t, params));
  }

  return {
    portPath,

    async connect(): Promise<Result<void, VnaError>> {
      if (state.status !== 'closed') return Ok();

      const opened = await transport.open();
      if (!opened.ok) {
        return Err(new VnaError('TRANSPORT_ERROR', `Failed to open ${portPath}: ${opened.error.message}`, opened.error));
      }

      channel.attach(transport);
      enterUndetected();
      return Ok();
    },

    async disconnect(): Promise<Result<void, VnaError>> {
      if (state.status === 'closed') return Ok();

      channel.detach();
      state = CLOSED;

      const closed = await transport.close();
      if (!closed.ok) {
        return Err(new VnaError('TRANSPORT_ERROR', `Failed to close ${portPath}: ${closed.error.message}`, closed.error));
      }
      return Ok();
    },

    async detect(): Promise<Result<string, VnaError>> {
      const open = requireOpen();
      if (!open.ok) return open;

      const detection = await detectVariant(channel, open.value.commandSet.info);
      if (!detection.ok) {
        enterUndetected();
        return detection;
      }

      enterDetected(detection.value.variant, detection.value.version);
      return Ok(detection.value.version);
    },

    forceVariant(forced: HardwareVariant): Result<void, VnaError> {
      const open = requireOpen();
      if (!open.ok) return open;

      enterDetected(forced, versionLabelFor(forced));
      return Ok();
    },

    getState(): VnaSessionState {
      return state;
    },

    getVariant(): HardwareVariant {
      return variant();
    },

    getVersion(): string {
      return state.status === 'detected' ? state.version : '';
    },

    getHardwareInfo(): HardwareInfo {
      return hardware();
    },

    getFrequencyRange(): FrequencyRange {
      return hardware().frequencyRange;
    },

    getMaxSweepPoints(): number {
      return hardware().maxSweepPoints;
    },

    getSupportedPorts(): readonly SParameter[] {
      return hardware().supportedPorts;
    },

    getCapabilities(): HardwareCapabilities {
      return hardware().capabilities;
    },

    isPortSupported(port: string): boolean {
      return isPortSupported(hardware(), port);
    },

    getPortDetails(): string {
      return transport.describe();
    },

    async configureSweep(startHz: number, stopHz: number, points: number): Promise<Result<void, VnaError>> {
      const open = requireOpen();
      if (!open.ok) return open;
      const info = open.value;
      const name = variantDisplayName(info.variant);
      const { minHz, maxHz } = info.frequencyRange;

      if (startHz < minHz) {
        return Err(new VnaError('OUT_OF_RANGE',
          `start frequency ${startHz} Hz is below minimum ${minHz} Hz for ${name}`,
          undefined, { startHz, minHz }));
      }
      if (stopHz > maxHz) {
        return Err(new VnaError('OUT_OF_RANGE',
          `stop frequency ${stopHz} Hz is above maximum ${maxHz} Hz for ${name}`,
          undefined, { stopHz, maxHz }));
      }
      if (points > info.maxSweepPoints) {
        return Err(new VnaError('OUT_OF_RANGE',
          `requested ${points} points exceeds maximum ${info.maxSweepPoints} for ${name}`,
          undefined, { points, maxSweepPoints: info.maxSweepPoints }));
      }

      const command = formatCommand(info.commandSet.sweep, { start: startHz, stop: stopHz, points });
      const primary = await channel.exchange(command);
      if (primary.ok) return Ok();

      // Firmware builds disagree on sweep syntax; stop at the first accepted form
      for (const fallback of fallbackCommands(startHz, stopHz, points)) {
        if (await trySend(fallback)) return Ok();
      }

      return Err(new VnaError(
        'COMMAND_FAILED',
        `Failed to set sweep config for ${name}: ${primary.error.message}`,
        primary.error,
        { command }
      ));
    },

    async runSweep(): Promise<Result<SweepData, VnaError>> {
      const open = requireOpen();
      if (!open.ok) return open;
      const info = open.value;
      const { commandSet } = info;
      const prompt = commandSet.promptMarker;

      const freqCommand = commandSet.frequencies;
      const freqResponse = await channel.exchange(freqCommand);
      if (!freqResponse.ok) return freqResponse;
      const frequencies = parseFrequencies(freqResponse.value, freqCommand, prompt);

      const s11Command = formatCommand(commandSet.data, { port: S11_PORT_INDEX });
      const s11Response = await channel.exchange(s11Command);
      if (!s11Response.ok) return s11Response;
      const s11 = parseComplexSamples(s11Response.value, s11Command, prompt);

      let s21: Complex[] = [];
      if (info.capabilities.hasS21 && isPortSupported(info, 'S21')) {
        const s21Command = formatCommand(commandSet.data, { port: S21_PORT_INDEX });
        const s21Response = await channel.exchange(s21Command);
        // Transmission path is optional; keep the sweep when it fails
        s21 = s21Response.ok
          ? parseComplexSamples(s21Response.value, s21Command, prompt)
          : zeroSamples(s11.length);
      }

      return reconcileSweep(frequencies, s11, s21);
    },

    async getInfo(): Promise<Result<DeviceInfo, VnaError>> {
      const open = requireOpen();
      if (!open.ok) return open;
      const { commandSet } = open.value;

      const response = await channel.exchange(commandSet.info);
      if (!response.ok) return response;

      return Ok(parseDeviceInfo(response.value, variant(), commandSet.info, commandSet.promptMarker));
    },

    // Calibration transfer is not implemented yet: these succeed without
    // touching the device and return empty data.

    async getCalibration(): Promise<Result<CalibrationData, VnaError>> {
      return Ok({ slot: null, coefficients: {} });
    },

    async setCalibration(_data: CalibrationData): Promise<Result<void, VnaError>> {
      return Ok();
    },

    async saveCalibration(_slot: number): Promise<Result<void, VnaError>> {
      return Ok();
    },

    async loadCalibration(_slot: number): Promise<Result<void, VnaError>> {
      return Ok();
    },
  };
}
