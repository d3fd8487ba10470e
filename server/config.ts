/**
 * Server configuration (defaults, overridable by ENV)
 */

import type { HardwareVariant } from '../shared/types.js';
import { isHardwareVariant } from './devices/registry.js';
import { DEFAULT_SERIAL_CONFIG } from './devices/transports/serial.js';

export interface ServerConfig {
  port: number;
  /** Serial path to open; null means auto-connect */
  vnaPort: string | null;
  /** Variant to force instead of detecting; null means detect */
  vnaVariant: HardwareVariant | null;
  baudRate: number;
  readTimeoutMs: number;
  /** Serve a simulated device instead of real hardware */
  simulate: boolean;
}

type Env = Record<string, string | undefined>;

function parseIntOr(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const variant = env.VNA_VARIANT?.trim().toLowerCase();
  if (variant && !isHardwareVariant(variant)) {
    console.warn(`[Config] Ignoring unknown VNA_VARIANT "${env.VNA_VARIANT}"`);
  }

  return {
    port: parseIntOr(env.PORT, 3002),
    vnaPort: env.VNA_PORT?.trim() || null,
    vnaVariant: variant && isHardwareVariant(variant) ? variant : null,
    baudRate: parseIntOr(env.VNA_BAUD_RATE, DEFAULT_SERIAL_CONFIG.baudRate),
    readTimeoutMs: parseIntOr(env.VNA_READ_TIMEOUT, DEFAULT_SERIAL_CONFIG.readTimeoutMs),
    simulate: env.VNA_SIMULATE === '1' || env.VNA_SIMULATE === 'true',
  };
}
