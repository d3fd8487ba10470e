/**
 * Command Channel
 * Request/response primitive for the NanoVNA text shell.
 *
 * One exchange: drop stale input, send "<command>\r", give the firmware a
 * moment, then collect chunks until the prompt marker shows up or the read
 * budget runs out. Exchanges are serialized; the firmware handles one command
 * at a time.
 */

import type { Transport, TransportError } from './types.js';
import { VnaError } from './types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { dbg, dbgV } from './debug.js';

export const COMMAND_TERMINATOR = '\r';

export interface ChannelTiming {
  /** Wait after writing before the first read */
  responseGraceMs: number;
  /** Wait between successive reads */
  readIntervalMs: number;
  maxReadAttempts: number;
}

export const DEFAULT_CHANNEL_TIMING: ChannelTiming = {
  responseGraceMs: 50,
  readIntervalMs: 20,
  maxReadAttempts: 10,
};

export interface CommandChannel {
  attach(transport: Transport): void;
  detach(): Transport | null;
  getTransport(): Transport | null;
  setPromptMarker(marker: string): void;
  getPromptMarker(): string;
  /** Send a command and collect its response up to the prompt marker */
  exchange(command: string): Promise<Result<string, VnaError>>;
  /** Send a bare terminator and return the single raw read that follows */
  probe(): Promise<Result<string, VnaError>>;
}

export interface CommandChannelOptions {
  promptMarker?: string;
  timing?: Partial<ChannelTiming>;
}

const delay = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

function transportFailure(action: string, error: TransportError): VnaError {
  return new VnaError('TRANSPORT_ERROR', `${action}: ${error.message}`, error, { reason: error.reason });
}

export function createCommandChannel(options: CommandChannelOptions = {}): CommandChannel {
  const timing: ChannelTiming = { ...DEFAULT_CHANNEL_TIMING, ...options.timing };
  let promptMarker = options.promptMarker ?? 'ch>';
  let transport: Transport | null = null;

  // Mutex to prevent concurrent command/response interleaving
  let commandLock: Promise<void> = Promise.resolve();

  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  function requireTransport(): Result<Transport, VnaError> {
    if (!transport || !transport.isOpen()) {
      return Err(new VnaError('NOT_CONNECTED', 'Device not open'));
    }
    return Ok(transport);
  }

  async function send(port: Transport, text: string, label: string): Promise<Result<void, VnaError>> {
    const discarded = await port.discardInput();
    if (!discarded.ok) return Err(transportFailure(`Failed to clear input before ${label}`, discarded.error));

    const written = await port.write(text);
    if (!written.ok) return Err(transportFailure(`Failed to write ${label}`, written.error));

    await delay(timing.responseGraceMs);
    return Ok();
  }

  return {
    attach(next: Transport): void {
      transport = next;
    },

    detach(): Transport | null {
      const previous = transport;
      transport = null;
      return previous;
    },

    getTransport(): Transport | null {
      return transport;
    },

    setPromptMarker(marker: string): void {
      promptMarker = marker;
    },

    getPromptMarker(): string {
      return promptMarker;
    },

    exchange(command: string): Promise<Result<string, VnaError>> {
      return withLock(async (): Promise<Result<string, VnaError>> => {
        const portResult = requireTransport();
        if (!portResult.ok) return portResult;
        const port = portResult.value;

        const sent = await send(port, command + COMMAND_TERMINATOR, `command "${command}"`);
        if (!sent.ok) return sent;

        let response = '';
        for (let attempt = 0; attempt < timing.maxReadAttempts; attempt++) {
          const chunk = await port.read();
          if (!chunk.ok) {
            // Silence after some output means the firmware is done talking
            if (chunk.error.reason === 'timeout' && response.length > 0) break;
            return Err(transportFailure(`No response to "${command}"`, chunk.error));
          }

          response += chunk.value;
          if (response.includes(promptMarker)) break;

          await delay(timing.readIntervalMs);
        }

        dbg(`> ${command} (${response.length} bytes)`);
        dbgV(JSON.stringify(response));
        return Ok(response);
      });
    },

    probe(): Promise<Result<string, VnaError>> {
      return withLock(async (): Promise<Result<string, VnaError>> => {
        const portResult = requireTransport();
        if (!portResult.ok) return portResult;
        const port = portResult.value;

        const sent = await send(port, COMMAND_TERMINATOR, 'probe');
        if (!sent.ok) return sent;

        const chunk = await port.read();
        if (!chunk.ok) return Err(transportFailure('No response to probe', chunk.error));

        dbgV('probe', JSON.stringify(chunk.value));
        return Ok(chunk.value);
      });
    },
  };
}
