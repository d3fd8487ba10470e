/**
 * VNA Connector
 * Owns the single active driver behind the HTTP API and the CLI
 *
 * Connect requests:
 *   { path, variant } - open path, force variant
 *   { path }          - open path, detect
 *   { variant }       - auto-connect, then force variant
 *   {}                - auto-connect
 * "sim:<variant>" paths open an in-process simulator instead of a serial port.
 */

import type { HardwareVariant, PortListing, VnaDriver, VnaError } from './types.js';
import type { Result } from '../../shared/types.js';
import { Ok } from '../../shared/types.js';
import type { ChannelTiming } from './command-channel.js';
import { autoConnect, openVna } from './scanner.js';
import { listSerialPorts } from './transports/serial.js';
import { createSimulatedVna, simulatedPortPath, simulatedVariantOf } from './simulation/index.js';

export interface ConnectRequest {
  path?: string;
  variant?: HardwareVariant;
}

export interface VnaConnectorOptions {
  baudRate?: number;
  readTimeoutMs?: number;
  timing?: Partial<ChannelTiming>;
  /** List only a simulated device of this variant instead of serial ports */
  simulateVariant?: HardwareVariant | null;
  listPorts?: () => Promise<PortListing[]>;
  openDriver?: (path: string) => Promise<Result<VnaDriver, VnaError>>;
}

export interface VnaConnector {
  current(): VnaDriver | null;
  listPorts(): Promise<PortListing[]>;
  connect(request?: ConnectRequest): Promise<Result<VnaDriver, VnaError>>;
  disconnect(): Promise<Result<void, VnaError>>;
}

export function createVnaConnector(options: VnaConnectorOptions = {}): VnaConnector {
  const simulateVariant = options.simulateVariant ?? null;
  let active: VnaDriver | null = null;

  async function defaultListPorts(): Promise<PortListing[]> {
    if (simulateVariant) {
      return [{ path: simulatedPortPath(simulateVariant), manufacturer: 'Simulator' }];
    }
    return listSerialPorts();
  }

  async function defaultOpenDriver(path: string): Promise<Result<VnaDriver, VnaError>> {
    const simulated = simulatedVariantOf(path);
    if (simulated) {
      const { driver } = createSimulatedVna({ variant: simulated, timing: options.timing });
      const connected = await driver.connect();
      if (!connected.ok) return connected;
      return Ok(driver);
    }
    return openVna(path, {
      serial: { baudRate: options.baudRate, readTimeoutMs: options.readTimeoutMs },
      timing: options.timing,
    });
  }

  const listPorts = options.listPorts ?? defaultListPorts;
  const openDriver = options.openDriver ?? defaultOpenDriver;

  // Mutex so a connect and a disconnect never interleave
  let connectLock: Promise<void> = Promise.resolve();

  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = connectLock;
    let releaseLock: () => void = () => {};
    connectLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  async function closeActive(): Promise<Result<void, VnaError>> {
    if (!active) return Ok();
    const driver = active;
    active = null;
    const closed = await driver.disconnect();
    if (closed.ok) {
      console.log(`[Connector] Disconnected ${driver.portPath}`);
    }
    return closed;
  }

  async function openAndDetect(path: string): Promise<Result<VnaDriver, VnaError>> {
    const opened = await openDriver(path);
    if (!opened.ok) return opened;

    const driver = opened.value;
    const detected = await driver.detect();
    if (!detected.ok) {
      const closed = await driver.disconnect();
      if (!closed.ok) {
        console.error(`[Connector] Failed to close ${path}:`, closed.error.message);
      }
      return detected;
    }
    return Ok(driver);
  }

  async function openDevice(request: ConnectRequest): Promise<Result<VnaDriver, VnaError>> {
    const { path, variant } = request;

    if (path && variant) {
      const opened = await openDriver(path);
      if (!opened.ok) return opened;
      const forced = opened.value.forceVariant(variant);
      if (!forced.ok) return forced;
      return opened;
    }

    if (path) return openAndDetect(path);

    const found = await autoConnect({ listPorts, openDriver });
    if (!found.ok || !variant) return found;
    const forced = found.value.forceVariant(variant);
    if (!forced.ok) return forced;
    return found;
  }

  return {
    current(): VnaDriver | null {
      return active;
    },

    listPorts,

    connect(request: ConnectRequest = {}): Promise<Result<VnaDriver, VnaError>> {
      return withLock(async (): Promise<Result<VnaDriver, VnaError>> => {
        const closed = await closeActive();
        if (!closed.ok) {
          console.error('[Connector] Failed to close previous device:', closed.error.message);
        }

        const opened = await openDevice(request);
        if (!opened.ok) return opened;

        active = opened.value;
        console.log(`[Connector] Connected ${active.portPath} (${active.getVariant()})`);
        return opened;
      });
    },

    disconnect(): Promise<Result<void, VnaError>> {
      return withLock(closeActive);
    },
  };
}
