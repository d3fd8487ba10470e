/**
 * NanoVNA Simulator
 * Stands in for the firmware shell of any NanoVNA-family variant
 *
 * Command set:
 * - <empty line>                  - prompt only (used for detection)
 * - info                          - board banner
 * - sweep <start> <stop> <points> - set sweep
 * - sweep start|stop|points <v>   - V2 scoped form
 * - start|stop|points <v>         - ChibiOS scoped form
 * - frequencies / freq            - one frequency per line
 * - data 0|1                      - S11 / S21 as "real imag" per line
 * - version                       - firmware version
 *
 * The DUT is a 75 Ω resistor in series with 10 nH on port 1 and a first-order
 * 100 MHz low-pass between the ports; values are deterministic.
 */

import type { Complex, HardwareVariant } from '../types.js';
import { isV2Family, lookupHardware } from '../registry.js';

export interface NanoVnaSimulatorOptions {
  variant?: HardwareVariant;
  /** Banner lines for `info` (default: per-variant banner) */
  banner?: string[];
  /** Commands that get no reply at all, matched on the full line or its first word */
  silentCommands?: string[];
  /** Initial number of sweep points (default: 101) */
  points?: number;
}

export interface SweepSettings {
  startHz: number;
  stopHz: number;
  points: number;
}

export interface NanoVnaSimulator {
  readonly variant: HardwareVariant;
  handleCommand(cmd: string): string | null;
  getSweep(): SweepSettings;
  getCommandLog(): string[];
}

const REFERENCE_OHMS = 50;
const LOAD_OHMS = 75;
const LOAD_HENRIES = 10e-9;
const LOWPASS_CORNER_HZ = 100e6;

const BANNERS: Record<HardwareVariant, string[]> = {
  unknown: ['USB serial device'],
  v1: ['NanoVNA V1', 'Serial: NV1-0001', 'Version: v0.4.5'],
  vh: ['NanoVNA-H 4', 'Serial: NVH-0002', 'Version: v1.2.00'],
  v2: ['NanoVNA V2_2', 'Firmware version: 20201013'],
  v2plus: ['NanoVNA V2 Plus', 'Firmware version: 20211210'],
  v2plus4: ['NanoVNA V2 Plus4', 'Firmware version: 20220118'],
  saa2: ['SAA2 Analyzer', 'Firmware version: 20200512'],
  tinysa: ['tinySA', 'Serial: TSA-0003', 'Version: v1.3-565'],
  litevna: ['LiteVNA 64', 'Serial: LV-0004', 'Version: v1.0.5'],
};

// What the shell prints for an empty command line
function probeReply(variant: HardwareVariant, prompt: string): string {
  if (variant === 'unknown') return 'OK\r\n';
  if (variant === 'vh') return `\r\n${prompt} `;
  return `${prompt} `;
}

export function reflection(frequencyHz: number): Complex {
  // Γ = (Z - Z0) / (Z + Z0), Z = R + jωL
  const x = 2 * Math.PI * frequencyHz * LOAD_HENRIES;
  const nr = LOAD_OHMS - REFERENCE_OHMS;
  const dr = LOAD_OHMS + REFERENCE_OHMS;
  const denom = dr * dr + x * x;
  return {
    re: (nr * dr + x * x) / denom,
    im: (x * dr - nr * x) / denom,
  };
}

export function transmission(frequencyHz: number): Complex {
  // H = 1 / (1 + j f/fc)
  const ratio = frequencyHz / LOWPASS_CORNER_HZ;
  const denom = 1 + ratio * ratio;
  return { re: 1 / denom, im: -ratio / denom };
}

export function createNanoVnaSimulator(options: NanoVnaSimulatorOptions = {}): NanoVnaSimulator {
  const variant = options.variant ?? 'v1';
  const info = lookupHardware(variant);
  const prompt = info.commandSet.promptMarker;
  const banner = options.banner ?? BANNERS[variant];
  const silent = new Set(options.silentCommands ?? []);
  const commandLog: string[] = [];

  const sweep: SweepSettings = {
    startHz: info.frequencyRange.minHz,
    stopHz: Math.min(info.frequencyRange.maxHz, 900e6),
    points: options.points ?? 101,
  };

  function frequencies(): number[] {
    const { startHz, stopHz, points } = sweep;
    if (points <= 1) return [startHz];
    const step = (stopHz - startHz) / (points - 1);
    return Array.from({ length: points }, (_, i) => Math.round(startHz + i * step));
  }

  function formatComplex(value: Complex): string {
    return `${value.re.toFixed(9)} ${value.im.toFixed(9)}`;
  }

  function reply(cmd: string, lines: string[]): string {
    const body = lines.map(line => `${line}\r\n`).join('');
    return `${cmd}\r\n${body}${prompt} `;
  }

  function parseInts(values: string[]): number[] | null {
    const parsed = values.map(v => Number.parseInt(v, 10));
    return parsed.every(n => Number.isFinite(n)) ? parsed : null;
  }

  function setScoped(name: string, value: number): boolean {
    if (name === 'start') sweep.startHz = value;
    else if (name === 'stop') sweep.stopHz = value;
    else if (name === 'points') sweep.points = value;
    else return false;
    return true;
  }

  function handleCommand(cmd: string): string | null {
    const line = cmd.trim();
    commandLog.push(line);
    const [word = '', ...args] = line.split(/\s+/);

    if (silent.has(line) || silent.has(word)) return null;

    if (line === '') {
      return probeReply(variant, prompt);
    }

    if (variant === 'unknown') {
      return `ERR ${line}\r\n`;
    }

    if (word === 'info') {
      return reply(line, banner);
    }

    if (word === 'version') {
      const version = banner.find(l => /version/i.test(l))?.split(':')[1]?.trim() ?? '';
      return reply(line, [version]);
    }

    if (word === 'sweep') {
      if (args.length === 3) {
        const values = parseInts(args);
        if (values) {
          [sweep.startHz, sweep.stopHz, sweep.points] = values;
          return reply(line, []);
        }
      }
      // Scoped form is only understood by the V2 console
      if (args.length === 2 && isV2Family(variant)) {
        const values = parseInts([args[1]]);
        if (values && setScoped(args[0], values[0])) return reply(line, []);
      }
      if (args.length === 0) {
        return reply(line, [`${sweep.startHz} ${sweep.stopHz} ${sweep.points}`]);
      }
      return reply(line, [`usage: sweep {start(Hz)} [stop(Hz)] [points]`, `${word}?`]);
    }

    if ((word === 'start' || word === 'stop' || word === 'points') && args.length === 1 && !isV2Family(variant)) {
      const values = parseInts(args);
      if (values && setScoped(word, values[0])) return reply(line, []);
    }

    if (word === info.commandSet.frequencies) {
      return reply(line, frequencies().map(f => String(f)));
    }

    if (word === 'data' && args.length === 1) {
      const port = Number.parseInt(args[0], 10);
      if (port === 0) return reply(line, frequencies().map(f => formatComplex(reflection(f))));
      if (port === 1 && info.capabilities.hasS21) {
        return reply(line, frequencies().map(f => formatComplex(transmission(f))));
      }
    }

    // Unknown command: ChibiOS shell prints "<cmd>?"
    console.warn(`[NanoVNA Simulator] Unknown command: ${line}`);
    return reply(line, [`${word}?`]);
  }

  return {
    variant,
    handleCommand,
    getSweep: () => ({ ...sweep }),
    getCommandLog: () => [...commandLog],
  };
}
