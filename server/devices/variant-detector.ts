/**
 * Variant Detector
 *
 * The firmware gives no machine-readable identity, so the variant is guessed
 * from the prompt it prints for an empty command line, refined by keywords in
 * the `info` banner. All heuristics live in classifyVariant() so firmware
 * quirks can be patched in one place.
 */

import type { CommandChannel } from './command-channel.js';
import type { HardwareVariant } from './types.js';
import { VnaError } from './types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';

export interface Detection {
  variant: HardwareVariant;
  /** Prompt family the probe matched: v1, vh or v2 */
  version: string;
  probe: string;
  info: string;
}

interface PromptRule {
  version: string;
  base: HardwareVariant;
  matches(probe: string): boolean;
  // Checked in order, more specific keywords first ("plus4" before "plus")
  refinements: Array<[keyword: string, variant: HardwareVariant]>;
}

const PROMPT_RULES: PromptRule[] = [
  {
    version: 'v1',
    base: 'v1',
    matches: probe => probe.startsWith('ch> '),
    refinements: [
      ['tinysa', 'tinysa'],
      ['litevna', 'litevna'],
    ],
  },
  {
    version: 'vh',
    base: 'vh',
    matches: probe => probe.startsWith('\r\nch> ') || probe.startsWith('\r\n?\r\nch> '),
    // Some v1 builds echo the extra newline too
    refinements: [['nanovna v1', 'v1']],
  },
  {
    version: 'v2',
    base: 'v2',
    matches: probe => probe.startsWith('2') || probe.includes('2>'),
    refinements: [
      ['plus4', 'v2plus4'],
      ['plus', 'v2plus'],
      ['saa2', 'saa2'],
    ],
  },
];

export function classifyVariant(probe: string, info: string): { variant: HardwareVariant; version: string } | null {
  const rule = PROMPT_RULES.find(r => r.matches(probe));
  if (!rule) return null;

  const infoLower = info.toLowerCase();
  const refined = rule.refinements.find(([keyword]) => infoLower.includes(keyword));
  return {
    variant: refined ? refined[1] : rule.base,
    version: rule.version,
  };
}

export async function detectVariant(
  channel: CommandChannel,
  infoCommand = 'info'
): Promise<Result<Detection, VnaError>> {
  const probe = await channel.probe();
  if (!probe.ok) return probe;

  // The banner only refines the guess; a silent info command is not fatal
  const infoResult = await channel.exchange(infoCommand);
  const info = infoResult.ok ? infoResult.value : '';

  const classified = classifyVariant(probe.value, info);
  if (!classified) {
    return Err(new VnaError(
      'UNRECOGNIZED_DEVICE',
      `Unrecognized response: ${JSON.stringify(probe.value)}`,
      undefined,
      { probe: probe.value }
    ));
  }

  return Ok({ ...classified, probe: probe.value, info });
}
