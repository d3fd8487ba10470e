/**
 * Serial Transport
 * Raw duplex channel over a USB CDC serial port (NanoVNA, TinySA, LiteVNA)
 *
 * Incoming bytes are buffered as they arrive; read() hands out everything
 * buffered so far, or waits up to readTimeoutMs for the next chunk.
 */

import { SerialPort } from 'serialport';
import type { SerialPortConfig, Transport } from '../types.js';
import { TransportError } from '../types.js';
import type { PortListing, Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';

export const DEFAULT_SERIAL_CONFIG: Omit<SerialPortConfig, 'path'> = {
  baudRate: 9600,
  dataBits: 8,
  parity: 'none',
  stopBits: 1,
  readTimeoutMs: 5000,
};

export function describeSerialConfig(config: SerialPortConfig): string {
  return `Port: ${config.path}, Baud: ${config.baudRate}, ReadTimeout: ${config.readTimeoutMs}ms, ` +
    `Size: ${config.dataBits}, Parity: ${config.parity}, StopBits: ${config.stopBits}`;
}

export function createSerialTransport(
  config: Pick<SerialPortConfig, 'path'> & Partial<SerialPortConfig>
): Transport {
  const resolved: SerialPortConfig = { ...DEFAULT_SERIAL_CONFIG, ...config };

  let port: SerialPort | null = null;
  let opened = false;
  let disconnected = false;
  let disconnectError: TransportError | null = null;

  // Received but not yet read
  let received: Buffer[] = [];
  // Pending read() waiting for the next chunk
  let wake: (() => void) | null = null;

  function onData(chunk: Buffer): void {
    received.push(chunk);
    wake?.();
  }

  function takeReceived(): string {
    const text = Buffer.concat(received).toString('latin1');
    received = [];
    return text;
  }

  function waitForData(timeoutMs: number): Promise<boolean> {
    return new Promise<boolean>(resolve => {
      const timeoutId = setTimeout(() => {
        wake = null;
        resolve(false);
      }, timeoutMs);
      wake = () => {
        clearTimeout(timeoutId);
        wake = null;
        resolve(true);
      };
    });
  }

  return {
    async open(): Promise<Result<void, Error>> {
      if (opened) return Ok();

      const serial = new SerialPort({
        path: resolved.path,
        baudRate: resolved.baudRate,
        dataBits: resolved.dataBits,
        parity: resolved.parity,
        stopBits: resolved.stopBits,
        autoOpen: false,
      });

      // Listen for port disconnection events
      serial.on('close', () => {
        disconnected = true;
        disconnectError = new TransportError('closed', 'SERIAL_PORT_DISCONNECTED: Port closed');
        opened = false;
        wake?.();
      });

      serial.on('error', (err: Error) => {
        disconnected = true;
        disconnectError = new TransportError('io', `SERIAL_PORT_ERROR: ${err.message}`);
        wake?.();
      });

      serial.on('data', onData);

      try {
        await new Promise<void>((resolve, reject) => {
          serial.open(err => {
            if (err) reject(err);
            else resolve();
          });
        });
      } catch (e) {
        serial.removeAllListeners();
        return Err(e instanceof Error ? e : new Error(String(e)));
      }

      port = serial;
      received = [];
      opened = true;
      disconnected = false;
      disconnectError = null;
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      const serial = port;
      if (!serial) return Ok();

      serial.removeAllListeners();
      port = null;
      received = [];
      wake?.();

      if (opened && !disconnected) {
        try {
          await new Promise<void>((resolve, reject) => {
            serial.close(err => {
              if (err) reject(err);
              else resolve();
            });
          });
        } catch (e) {
          opened = false;
          return Err(e instanceof Error ? e : new Error(String(e)));
        }
      }

      opened = false;
      disconnected = false;
      disconnectError = null;
      return Ok();
    },

    async write(data: string): Promise<Result<number, TransportError>> {
      if (disconnected) {
        return Err(disconnectError ?? new TransportError('closed', 'SERIAL_PORT_DISCONNECTED'));
      }
      const serial = port;
      if (!serial) {
        return Err(new TransportError('closed', 'Port not opened'));
      }

      const bytes = Buffer.from(data, 'latin1');
      try {
        await new Promise<void>((resolve, reject) => {
          serial.write(bytes, err => {
            if (err) reject(err);
            else resolve();
          });
        });
        await new Promise<void>((resolve, reject) => {
          serial.drain(err => {
            if (err) reject(err);
            else resolve();
          });
        });
      } catch (e) {
        return Err(new TransportError('io', e instanceof Error ? e.message : String(e)));
      }
      return Ok(bytes.length);
    },

    async read(): Promise<Result<string, TransportError>> {
      if (received.length === 0 && !disconnected && port) {
        await waitForData(resolved.readTimeoutMs);
      }
      if (received.length > 0) {
        return Ok(takeReceived());
      }
      if (disconnected) {
        return Err(disconnectError ?? new TransportError('closed', 'SERIAL_PORT_DISCONNECTED'));
      }
      if (!port) {
        return Err(new TransportError('closed', 'Port not opened'));
      }
      return Err(new TransportError('timeout', `Read timeout after ${resolved.readTimeoutMs}ms on ${resolved.path}`));
    },

    async discardInput(): Promise<Result<void, TransportError>> {
      received = [];
      const serial = port;
      if (!serial || disconnected) return Ok();

      try {
        await new Promise<void>((resolve, reject) => {
          serial.flush(err => {
            if (err) reject(err);
            else resolve();
          });
        });
      } catch (e) {
        return Err(new TransportError('io', e instanceof Error ? e.message : String(e)));
      }
      // Bytes may have landed between the flush request and its callback
      received = [];
      return Ok();
    },

    isOpen(): boolean {
      return opened && !disconnected;
    },

    describe(): string {
      return describeSerialConfig(resolved);
    },
  };
}

// Helper to list available serial ports
export async function listSerialPorts(): Promise<PortListing[]> {
  const ports = await SerialPort.list();
  return ports.map(p => ({
    // On macOS, use cu. instead of tty. for outgoing connections
    path: p.path.replace('/dev/tty.', '/dev/cu.'),
    manufacturer: p.manufacturer,
  }));
}
