/**
 * Simulated Transport
 * Implements the Transport interface for simulated devices
 *
 * Each carriage-return terminated line written is routed to a simulator;
 * its reply is queued for read(). Adds configurable latency to mimic real
 * device timing, and can hand the reply out in small chunks the way a USB
 * CDC port does.
 */

import type { Transport } from '../types.js';
import { TransportError } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';

export interface SimulatedTransportConfig {
  /** Base latency in ms (default: 2) */
  latencyMs?: number;
  /** Random jitter range in ms (default: 0) */
  jitterMs?: number;
  /** Largest chunk returned by one read() (default: unlimited) */
  chunkSize?: number;
  /** Name for logging */
  name?: string;
}

/** Returns the device's reply, or null for no reply at all */
export type CommandHandler = (cmd: string) => string | null;

export function createSimulatedTransport(
  handler: CommandHandler,
  config: SimulatedTransportConfig = {}
): Transport {
  const { latencyMs = 2, jitterMs = 0, chunkSize = Infinity, name = 'simulated' } = config;

  let opened = false;
  // Written text not yet terminated by "\r"
  let lineBuffer = '';
  let output = '';

  async function delay(): Promise<void> {
    const jitter = Math.random() * jitterMs;
    const totalDelay = latencyMs + jitter;
    await new Promise(r => setTimeout(r, totalDelay));
  }

  return {
    async open(): Promise<Result<void, Error>> {
      opened = true;
      lineBuffer = '';
      output = '';
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      opened = false;
      return Ok();
    },

    async write(data: string): Promise<Result<number, TransportError>> {
      if (!opened) return Err(new TransportError('closed', `${name}: transport not opened`));

      lineBuffer += data;
      let end = lineBuffer.indexOf('\r');
      while (end !== -1) {
        const line = lineBuffer.slice(0, end);
        lineBuffer = lineBuffer.slice(end + 1);
        const response = handler(line);
        if (response !== null) output += response;
        end = lineBuffer.indexOf('\r');
      }
      return Ok(data.length);
    },

    async read(): Promise<Result<string, TransportError>> {
      if (!opened) return Err(new TransportError('closed', `${name}: transport not opened`));

      await delay();
      if (output.length === 0) {
        return Err(new TransportError('timeout', `${name}: read timeout`));
      }
      const chunk = output.slice(0, chunkSize);
      output = output.slice(chunk.length);
      return Ok(chunk);
    },

    async discardInput(): Promise<Result<void, TransportError>> {
      output = '';
      return Ok();
    },

    isOpen(): boolean {
      return opened;
    },

    describe(): string {
      return `Simulated port: ${name}`;
    },
  };
}
