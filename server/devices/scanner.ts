/**
 * Device Scanner
 * Opens candidate ports and keeps the first one that detects as a NanoVNA
 *
 * - Each candidate: open, then detect; close and move on if either fails
 * - Uses mutex to prevent concurrent scans fighting over the same ports
 */

import type { HardwareVariant, PortListing, SerialPortConfig, VnaDriver } from './types.js';
import { VnaError } from './types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err, tryResultAsync } from '../../shared/types.js';
import type { ChannelTiming } from './command-channel.js';
import { createNanoVnaDriver } from './drivers/nanovna.js';
import { createSerialTransport, listSerialPorts } from './transports/serial.js';
import { variantDisplayName } from './registry.js';

export interface OpenOptions {
  serial?: Partial<Omit<SerialPortConfig, 'path'>>;
  timing?: Partial<ChannelTiming>;
}

/** Open a serial port and wrap it in an undetected driver */
export async function openVna(path: string, options: OpenOptions = {}): Promise<Result<VnaDriver, VnaError>> {
  const transport = createSerialTransport({ ...options.serial, path });
  const driver = createNanoVnaDriver(transport, { portPath: path, timing: options.timing });

  const connected = await driver.connect();
  if (!connected.ok) return connected;
  return Ok(driver);
}

/** Open a port and skip detection, trusting the caller's variant */
export async function openVnaWithVariant(
  path: string,
  variant: HardwareVariant,
  options: OpenOptions = {}
): Promise<Result<VnaDriver, VnaError>> {
  const opened = await openVna(path, options);
  if (!opened.ok) return opened;

  const forced = opened.value.forceVariant(variant);
  if (!forced.ok) return forced;
  return opened;
}

export interface AutoConnectOptions {
  /** Candidate port identifiers (default: all serial ports) */
  listPorts?: () => Promise<PortListing[]>;
  /** Open one candidate (default: openVna) */
  openDriver?: (path: string) => Promise<Result<VnaDriver, VnaError>>;
}

// Mutex to prevent concurrent scans
let scanLock: Promise<void> = Promise.resolve();

async function withScanLock<T>(fn: () => Promise<T>): Promise<T> {
  const previousLock = scanLock;
  let releaseLock: () => void = () => {};
  scanLock = new Promise<void>(resolve => {
    releaseLock = resolve;
  });
  await previousLock;
  try {
    return await fn();
  } finally {
    releaseLock();
  }
}

export async function autoConnect(options: AutoConnectOptions = {}): Promise<Result<VnaDriver, VnaError>> {
  const listPorts = options.listPorts ?? listSerialPorts;
  const openDriver = options.openDriver ?? ((path: string) => openVna(path));

  return withScanLock(async (): Promise<Result<VnaDriver, VnaError>> => {
    const listed = await tryResultAsync(listPorts);
    if (!listed.ok) {
      return Err(new VnaError('NO_DEVICE_FOUND', `Failed to list serial ports: ${listed.error.message}`, listed.error));
    }
    const ports = listed.value;

    const tried: string[] = [];
    for (const port of ports) {
      tried.push(port.path);

      const opened = await openDriver(port.path);
      if (!opened.ok) {
        console.log(`[Scanner] Skipping ${port.path}: ${opened.error.message}`);
        continue;
      }

      const driver = opened.value;
      const detected = await driver.detect();
      if (!detected.ok) {
        console.log(`[Scanner] Probe failed for ${port.path}: ${detected.error.message}`);
        const closed = await driver.disconnect();
        if (!closed.ok) {
          console.error(`[Scanner] Failed to close ${port.path}:`, closed.error.message);
        }
        continue;
      }

      console.log(`[Scanner] CONNECTED: ${port.path} (${variantDisplayName(driver.getVariant())}, ${detected.value})`);
      return Ok(driver);
    }

    return Err(new VnaError(
      'NO_DEVICE_FOUND',
      ports.length === 0 ? 'No serial ports found' : 'No NanoVNA devices found on any serial port',
      undefined,
      { tried }
    ));
  });
}
