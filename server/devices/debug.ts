export const DEBUG_VNA = process.env.DEBUG_VNA === '1' || process.env.DEBUG_VNA === '2' || process.env.DEBUG_VNA === 'true';
export const DEBUG_VNA_LEVEL = Number.parseInt(process.env.DEBUG_VNA || '0', 10) || (DEBUG_VNA ? 1 : 0);

export function dbg(...args: unknown[]): void {
  if (DEBUG_VNA_LEVEL >= 1) console.log('[vna]', ...args);
}

export function dbgV(...args: unknown[]): void {
  if (DEBUG_VNA_LEVEL >= 2) console.log('[vna]', ...args);
}
