/**
 * Simulation Module
 * Creates a simulated analyzer using the real driver with a simulated transport
 *
 * Usage:
 *   const { driver, simulator } = createSimulatedVna({ variant: 'vh' });
 *
 * Configuration via environment variables:
 *   SIM_VNA_LATENCY_MS - Command latency (default: 2ms)
 *   SIM_VNA_CHUNK_SIZE - Bytes per read, 0 for whole replies (default: 0)
 */

import type { HardwareVariant, VnaDriver } from '../types.js';
import type { ChannelTiming } from '../command-channel.js';
import { createNanoVnaDriver } from '../drivers/nanovna.js';
import { isHardwareVariant } from '../registry.js';
import { createNanoVnaSimulator, type NanoVnaSimulator, type NanoVnaSimulatorOptions } from './nanovna-simulator.js';
import { createSimulatedTransport } from './simulated-transport.js';

export interface SimulatedVnaConfig extends NanoVnaSimulatorOptions {
  latencyMs?: number;
  chunkSize?: number;
  timing?: Partial<ChannelTiming>;
}

export interface SimulatedVna {
  driver: VnaDriver;
  simulator: NanoVnaSimulator;
}

function loadConfigFromEnv(): { latencyMs: number; chunkSize: number } {
  const parseNumber = (envVar: string | undefined, defaultVal: number): number => {
    if (!envVar) return defaultVal;
    const parsed = Number.parseFloat(envVar);
    return Number.isNaN(parsed) ? defaultVal : parsed;
  };

  return {
    latencyMs: parseNumber(process.env.SIM_VNA_LATENCY_MS, 2),
    chunkSize: parseNumber(process.env.SIM_VNA_CHUNK_SIZE, 0),
  };
}

export function createSimulatedVna(config: SimulatedVnaConfig = {}): SimulatedVna {
  const envConfig = loadConfigFromEnv();
  const latencyMs = config.latencyMs ?? envConfig.latencyMs;
  const chunkSize = config.chunkSize ?? envConfig.chunkSize;

  const simulator = createNanoVnaSimulator(config);
  const name = simulatedPortPath(simulator.variant);

  const transport = createSimulatedTransport(
    cmd => simulator.handleCommand(cmd),
    { latencyMs, chunkSize: chunkSize > 0 ? chunkSize : Infinity, name }
  );

  const driver = createNanoVnaDriver(transport, { portPath: name, timing: config.timing });
  return { driver, simulator };
}

const SIM_PREFIX = 'sim:';

export function simulatedPortPath(variant: HardwareVariant): string {
  return `${SIM_PREFIX}${variant}`;
}

/** Variant named by a "sim:<variant>" port path, or null for real ports */
export function simulatedVariantOf(path: string): HardwareVariant | null {
  if (!path.startsWith(SIM_PREFIX)) return null;
  const name = path.slice(SIM_PREFIX.length);
  return isHardwareVariant(name) ? name : null;
}

export type { NanoVnaSimulator, NanoVnaSimulatorOptions } from './nanovna-simulator.js';
