/**
 * Harness to verify the driver against a real (or simulated) analyzer
 * Connects, prints hardware info, runs one sweep over the 2 m band
 *
 * Usage: VNA_PORT=/dev/ttyACM0 VNA_VARIANT=vh npm run sweep
 *        VNA_SIMULATE=1 npm run sweep
 */

import { loadConfig } from './server/config.js';
import { createVnaConnector } from './server/devices/connector.js';
import { variantDisplayName } from './server/devices/registry.js';
import { simulatedPortPath } from './server/devices/simulation/index.js';

const SWEEP_START_HZ = 144e6;
const SWEEP_STOP_HZ = 148e6;
const SWEEP_POINTS = 101;

async function main(): Promise<number> {
  const config = loadConfig();
  const connector = createVnaConnector({
    baudRate: config.baudRate,
    readTimeoutMs: config.readTimeoutMs,
    simulateVariant: config.simulate ? config.vnaVariant ?? 'v1' : null,
  });

  const path = config.vnaPort ?? (config.simulate ? simulatedPortPath(config.vnaVariant ?? 'v1') : undefined);
  console.log(path ? `Connecting to ${path}...` : 'Scanning for analyzers...');

  const connected = await connector.connect({ path, variant: config.vnaVariant ?? undefined });
  if (!connected.ok) {
    console.error('Connect failed:', connected.error.message);
    return 1;
  }
  const vna = connected.value;

  const range = vna.getFrequencyRange();
  const caps = vna.getCapabilities();
  console.log('\n=== Hardware ===');
  console.log('  Variant:', variantDisplayName(vna.getVariant()), `(${vna.getVersion()})`);
  console.log('  Port:', vna.getPortDetails());
  console.log('  Range:', range.minHz / 1e6, '-', range.maxHz / 1e6, 'MHz');
  console.log('  Max points:', vna.getMaxSweepPoints());
  console.log('  S-parameters:', vna.getSupportedPorts().join(', '));
  console.log('  Capabilities:');
  for (const [name, enabled] of Object.entries(caps)) {
    console.log(`    ${name}: ${enabled ? 'yes' : 'no'}`);
  }

  const info = await vna.getInfo();
  if (info.ok) {
    console.log('  Model:', info.value.model || '-');
    console.log('  Firmware:', info.value.firmware || '-');
    console.log('  Serial:', info.value.serialNumber || '-');
  } else {
    console.log('  Info unavailable:', info.error.message);
  }

  console.log('\n=== Sweep ===');
  const configured = await vna.configureSweep(SWEEP_START_HZ, SWEEP_STOP_HZ, SWEEP_POINTS);
  if (!configured.ok) {
    console.error('Configure failed:', configured.error.message);
    await connector.disconnect();
    return 1;
  }

  const sweep = await vna.runSweep();
  if (!sweep.ok) {
    console.error('Sweep failed:', sweep.error.message);
    await connector.disconnect();
    return 1;
  }

  const { frequencies, s11, s21 } = sweep.value;
  console.log(`  ${frequencies.length} points`);
  for (let i = 0; i < Math.min(5, frequencies.length); i++) {
    const mhz = (frequencies[i] / 1e6).toFixed(3);
    console.log(
      `  ${mhz} MHz  S11 ${s11[i].re.toFixed(4)} ${s11[i].im.toFixed(4)}  S21 ${s21[i].re.toFixed(4)} ${s21[i].im.toFixed(4)}`
    );
  }

  const closed = await connector.disconnect();
  if (!closed.ok) {
    console.error('Disconnect failed:', closed.error.message);
    return 1;
  }
  console.log('\nDisconnected');
  return 0;
}

main()
  .then(code => process.exit(code))
  .catch(err => {
    console.error('Error:', err);
    process.exit(1);
  });
