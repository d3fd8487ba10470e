/**
 * Capability Registry
 * Static description of every NanoVNA-family variant: frequency range,
 * point limit, measurable ports, command dialect and feature flags.
 *
 * Entries are frozen and shared by all sessions.
 */

import type {
  CommandSet,
  HardwareCapabilities,
  HardwareInfo,
  HardwareVariant,
  SParameter,
} from './types.js';

export const HARDWARE_VARIANTS: readonly HardwareVariant[] = [
  'unknown',
  'v1',
  'vh',
  'v2',
  'v2plus',
  'v2plus4',
  'saa2',
  'tinysa',
  'litevna',
];

const DISPLAY_NAMES: Record<HardwareVariant, string> = {
  unknown: 'Unknown',
  v1: 'NanoVNA v1',
  vh: 'NanoVNA-H',
  v2: 'NanoVNA v2',
  v2plus: 'NanoVNA v2 Plus',
  v2plus4: 'NanoVNA v2 Plus4',
  saa2: 'SAA2',
  tinysa: 'TinySA',
  litevna: 'LiteVNA',
};

// Version label reported when a variant is forced instead of detected
const VERSION_LABELS: Record<HardwareVariant, string> = {
  unknown: 'unknown',
  v1: 'v1',
  vh: 'vh',
  v2: 'v2',
  v2plus: 'v2',
  v2plus4: 'v2',
  saa2: 'v2',
  tinysa: 'tinysa',
  litevna: 'litevna',
};

// ChibiOS shell dialect (v1, H, TinySA, LiteVNA)
const CHIBIOS_COMMANDS: CommandSet = {
  sweep: 'sweep {start} {stop} {points}',
  frequencies: 'frequencies',
  data: 'data {port}',
  info: 'info',
  version: 'version',
  calibrationSave: 'save {slot}',
  calibrationLoad: 'recall {slot}',
  promptMarker: 'ch>',
};

// V2 family text console
const V2_COMMANDS: CommandSet = {
  ...CHIBIOS_COMMANDS,
  frequencies: 'freq',
  promptMarker: '2>',
};

const MHZ = 1_000_000;
const GHZ = 1_000_000_000;

function caps(flags: Partial<HardwareCapabilities>): HardwareCapabilities {
  return {
    hasS21: false,
    hasTimeDomain: false,
    hasCalibration: true,
    hasMultiplePorts: false,
    hasGenerator: false,
    hasSpectrumMode: false,
    ...flags,
  };
}

function entry(
  variant: HardwareVariant,
  minHz: number,
  maxHz: number,
  maxSweepPoints: number,
  supportedPorts: SParameter[],
  commandSet: CommandSet,
  capabilities: HardwareCapabilities
): HardwareInfo {
  return Object.freeze({
    variant,
    frequencyRange: Object.freeze({ minHz, maxHz }),
    maxSweepPoints,
    supportedPorts: Object.freeze(supportedPorts),
    commandSet: Object.freeze({ ...commandSet }),
    capabilities: Object.freeze(capabilities),
  });
}

const V2_FEATURES = caps({ hasS21: true, hasTimeDomain: true, hasGenerator: true, hasSpectrumMode: true });

const HARDWARE_TABLE: Record<HardwareVariant, HardwareInfo> = {
  // Conservative defaults until detection succeeds
  unknown: entry('unknown', 50_000, 900 * MHZ, 101, ['S11'], CHIBIOS_COMMANDS, caps({})),
  v1: entry('v1', 50_000, 900 * MHZ, 101, ['S11', 'S21'], CHIBIOS_COMMANDS, caps({ hasS21: true })),
  vh: entry(
    'vh', 50_000, 1.5 * GHZ, 201, ['S11', 'S21'], CHIBIOS_COMMANDS,
    caps({ hasS21: true, hasTimeDomain: true, hasGenerator: true })
  ),
  v2: entry('v2', 50_000, 3 * GHZ, 4000, ['S11', 'S21'], V2_COMMANDS, V2_FEATURES),
  v2plus: entry('v2plus', 50_000, 6 * GHZ, 4000, ['S11', 'S21'], V2_COMMANDS, V2_FEATURES),
  v2plus4: entry(
    'v2plus4', 50_000, 6 * GHZ, 4000, ['S11', 'S21', 'S12', 'S22'], V2_COMMANDS,
    caps({ ...V2_FEATURES, hasMultiplePorts: true })
  ),
  // SAA2 and LiteVNA limits are taken from the vendors' hardware specifications
  saa2: entry('saa2', 50_000, 3 * GHZ, 4000, ['S11', 'S21'], V2_COMMANDS, V2_FEATURES),
  tinysa: entry(
    'tinysa', 100_000, 960 * MHZ, 500, ['S11'], CHIBIOS_COMMANDS,
    caps({ hasGenerator: true, hasSpectrumMode: true })
  ),
  litevna: entry(
    'litevna', 50_000, 6_300 * MHZ, 1024, ['S11', 'S21'], CHIBIOS_COMMANDS,
    caps({ hasS21: true, hasTimeDomain: true })
  ),
};

export function lookupHardware(variant: HardwareVariant): HardwareInfo {
  return HARDWARE_TABLE[variant];
}

export function variantDisplayName(variant: HardwareVariant): string {
  return DISPLAY_NAMES[variant];
}

export function versionLabelFor(variant: HardwareVariant): string {
  return VERSION_LABELS[variant];
}

/** Variants that share the V2 sweep fallback sequence */
export function isV2Family(variant: HardwareVariant): boolean {
  return variant === 'v2' || variant === 'v2plus' || variant === 'v2plus4';
}

/** Variants whose info banner uses the V2 "key: value" layout */
export function hasV2InfoLayout(variant: HardwareVariant): boolean {
  return isV2Family(variant) || variant === 'saa2';
}

export function isHardwareVariant(value: unknown): value is HardwareVariant {
  return typeof value === 'string' && HARDWARE_VARIANTS.some(v => v === value);
}

export function isPortSupported(info: HardwareInfo, port: string): boolean {
  return info.supportedPorts.some(p => p === port);
}

/**
 * Fill a command template's {placeholders}.
 * Numbers are sent as integers; unknown placeholders are left as-is.
 */
export function formatCommand(template: string, params: Record<string, number>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    const value = params[key];
    return value === undefined ? match : String(Math.round(value));
  });
}

/** First word of a template, e.g. "data" for "data {port}" */
export function commandToken(template: string): string {
  return template.trim().split(/\s+/)[0] ?? '';
}
