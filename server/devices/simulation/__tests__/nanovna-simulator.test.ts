import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { HardwareVariant } from '../../types.js';
import { createNanoVnaSimulator, reflection, transmission, type NanoVnaSimulator } from '../nanovna-simulator.js';
import { createSimulatedTransport } from '../simulated-transport.js';
import { createSimulatedVna, simulatedPortPath, simulatedVariantOf } from '../index.js';

const FAST_TIMING = { responseGraceMs: 0, readIntervalMs: 0 };

describe('NanoVnaSimulator', () => {
  let vna: NanoVnaSimulator;

  beforeEach(() => {
    vna = createNanoVnaSimulator({ variant: 'v1' });
  });

  describe('Prompt', () => {
    it('should answer an empty line with the prompt', () => {
      expect(vna.handleCommand('')).toBe('ch> ');
    });

    it('should print a leading newline on the H model', () => {
      expect(createNanoVnaSimulator({ variant: 'vh' }).handleCommand('')).toBe('\r\nch> ');
    });

    it('should use the V2 console prompt', () => {
      expect(createNanoVnaSimulator({ variant: 'v2plus' }).handleCommand('')).toBe('2> ');
    });

    it('should not speak the shell protocol as an unknown device', () => {
      const other = createNanoVnaSimulator({ variant: 'unknown' });
      expect(other.handleCommand('')).toBe('OK\r\n');
      expect(other.handleCommand('info')).toBe('ERR info\r\n');
    });
  });

  describe('Info Commands', () => {
    it('should echo the command and print the banner', () => {
      expect(vna.handleCommand('info')).toBe('info\r\nNanoVNA V1\r\nSerial: NV1-0001\r\nVersion: v0.4.5\r\nch> ');
    });

    it('should report the firmware version', () => {
      expect(vna.handleCommand('version')).toBe('version\r\nv0.4.5\r\nch> ');
    });

    it('should accept a custom banner', () => {
      const custom = createNanoVnaSimulator({ variant: 'v1', banner: ['Test Board'] });
      expect(custom.handleCommand('info')).toBe('info\r\nTest Board\r\nch> ');
    });
  });

  describe('Sweep Commands', () => {
    it('should set the sweep with the one-shot form', () => {
      vna.handleCommand('sweep 1000000 2000000 3');
      expect(vna.getSweep()).toEqual({ startHz: 1_000_000, stopHz: 2_000_000, points: 3 });
      expect(vna.handleCommand('frequencies')).toBe('frequencies\r\n1000000\r\n1500000\r\n2000000\r\nch> ');
    });

    it('should accept scoped ChibiOS commands', () => {
      vna.handleCommand('start 1000');
      vna.handleCommand('stop 5000');
      vna.handleCommand('points 5');
      expect(vna.getSweep()).toEqual({ startHz: 1000, stopHz: 5000, points: 5 });
    });

    it('should accept scoped sweep commands only on the V2 console', () => {
      const v2 = createNanoVnaSimulator({ variant: 'v2' });
      v2.handleCommand('sweep start 2000');
      expect(v2.getSweep().startHz).toBe(2000);

      expect(vna.handleCommand('sweep start 2000')).toBe(
        'sweep start 2000\r\nusage: sweep {start(Hz)} [stop(Hz)] [points]\r\nsweep?\r\nch> '
      );
      expect(vna.getSweep().startHz).toBe(50_000);
    });

    it('should report the current sweep', () => {
      expect(vna.handleCommand('sweep')).toBe('sweep\r\n50000 900000000 101\r\nch> ');
    });
  });

  describe('Data Commands', () => {
    it('should print reflection and transmission samples', () => {
      vna.handleCommand('sweep 0 100000000 2');
      const s11 = vna.handleCommand('data 0');
      expect(s11?.split('\r\n')[1]).toBe('0.200000000 0.000000000');
      expect(vna.handleCommand('data 1')).toBe(
        'data 1\r\n1.000000000 0.000000000\r\n0.500000000 -0.500000000\r\nch> '
      );
    });

    it('should reject S21 on variants without it', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const tinysa = createNanoVnaSimulator({ variant: 'tinysa' });
      expect(tinysa.handleCommand('data 1')).toBe('data 1\r\ndata?\r\nch> ');
      expect(warn).toHaveBeenCalledWith('[NanoVNA Simulator] Unknown command: data 1');
      warn.mockRestore();
    });
  });

  describe('Silent Commands', () => {
    it('should not answer silenced commands', () => {
      const quiet = createNanoVnaSimulator({ variant: 'v1', silentCommands: ['data 1'] });
      expect(quiet.handleCommand('data 1')).toBeNull();
      expect(quiet.handleCommand('data 0')).not.toBeNull();
      expect(quiet.getCommandLog()).toEqual(['data 1', 'data 0']);
    });
  });

  describe('Device model', () => {
    it('should reflect a 75 ohm load at DC', () => {
      expect(reflection(0)).toEqual({ re: 0.2, im: 0 });
    });

    it('should be 3 dB down at the low-pass corner', () => {
      expect(transmission(100e6)).toEqual({ re: 0.5, im: -0.5 });
    });
  });
});

describe('SimulatedTransport', () => {
  it('should route terminated lines to the handler and hand out the reply in chunks', async () => {
    const transport = createSimulatedTransport(cmd => `<${cmd}>`, { latencyMs: 0, chunkSize: 3 });
    await transport.open();

    await transport.write('ab\rcd');
    expect(await transport.read()).toEqual({ ok: true, value: '<ab' });
    expect(await transport.read()).toEqual({ ok: true, value: '>' });

    await transport.write('\r');
    expect(await transport.read()).toEqual({ ok: true, value: '<cd' });
  });

  it('should time out when there is nothing to read', async () => {
    const transport = createSimulatedTransport(() => null, { latencyMs: 0 });
    await transport.open();
    await transport.write('x\r');

    const result = await transport.read();
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('timeout');
  });

  it('should refuse io when closed', async () => {
    const transport = createSimulatedTransport(() => 'ok', { latencyMs: 0, name: 'sim:v1' });
    const result = await transport.write('x\r');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('sim:v1: transport not opened');
    expect(transport.describe()).toBe('Simulated port: sim:v1');
  });
});

describe('Simulated analyzer end to end', () => {
  const cases: Array<[HardwareVariant, string]> = [
    ['v1', 'v1'],
    ['vh', 'vh'],
    ['v2', 'v2'],
    ['v2plus', 'v2'],
    ['v2plus4', 'v2'],
    ['saa2', 'v2'],
    ['tinysa', 'v1'],
    ['litevna', 'v1'],
  ];

  it.each(cases)('should detect %s', async (variant, version) => {
    const { driver } = createSimulatedVna({ variant, latencyMs: 0, timing: FAST_TIMING });
    await driver.connect();

    const result = await driver.detect();

    expect(result).toEqual({ ok: true, value: version });
    expect(driver.getVariant()).toBe(variant);
  });

  it('should not recognize a non-VNA device', async () => {
    const { driver } = createSimulatedVna({ variant: 'unknown', latencyMs: 0, timing: FAST_TIMING });
    await driver.connect();

    const result = await driver.detect();

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('UNRECOGNIZED_DEVICE');
    expect(driver.getState().status).toBe('undetected');
  });

  it('should configure and run a sweep on a V2 Plus', async () => {
    const { driver, simulator } = createSimulatedVna({ variant: 'v2plus', latencyMs: 0, timing: FAST_TIMING });
    await driver.connect();
    await driver.detect();

    const configured = await driver.configureSweep(144_000_000, 148_000_000, 11);
    expect(configured.ok).toBe(true);
    expect(simulator.getSweep()).toEqual({ startHz: 144_000_000, stopHz: 148_000_000, points: 11 });

    const sweep = await driver.runSweep();
    expect(sweep.ok).toBe(true);
    if (sweep.ok) {
      expect(sweep.value.frequencies).toHaveLength(11);
      expect(sweep.value.frequencies[0]).toBe(144_000_000);
      expect(sweep.value.frequencies[10]).toBe(148_000_000);
      expect(sweep.value.s11).toHaveLength(11);
      expect(sweep.value.s21).toHaveLength(11);
    }
    expect(simulator.getCommandLog().slice(-3)).toEqual(['freq', 'data 0', 'data 1']);
  });

  it('should fall back to scoped commands when the one-shot form is ignored', async () => {
    const { driver, simulator } = createSimulatedVna({
      variant: 'v1',
      silentCommands: ['sweep'],
      latencyMs: 0,
      timing: FAST_TIMING,
    });
    await driver.connect();
    await driver.detect();

    const result = await driver.configureSweep(1_000_000, 30_000_000, 11);

    expect(result.ok).toBe(true);
    expect(simulator.getCommandLog().slice(-2)).toEqual(['sweep 1000000 30000000 11', 'start 1000000']);
    expect(simulator.getSweep()).toEqual({ startHz: 1_000_000, stopHz: 900_000_000, points: 101 });
  });

  it('should reassemble replies delivered in small chunks', async () => {
    const { driver } = createSimulatedVna({
      variant: 'v1',
      points: 5,
      chunkSize: 32,
      latencyMs: 0,
      timing: FAST_TIMING,
    });
    await driver.connect();
    await driver.detect();

    const sweep = await driver.runSweep();

    expect(sweep.ok).toBe(true);
    if (sweep.ok) expect(sweep.value.frequencies).toHaveLength(5);
  });

  it('should read the banner through getInfo', async () => {
    const { driver } = createSimulatedVna({ variant: 'vh', latencyMs: 0, timing: FAST_TIMING });
    await driver.connect();
    await driver.detect();

    expect(await driver.getInfo()).toEqual({
      ok: true,
      value: { model: 'NanoVNA-H 4', firmware: 'v1.2.00', serialNumber: 'NVH-0002' },
    });
  });
});

describe('simulated port paths', () => {
  it('should round-trip the variant through the port path', () => {
    expect(simulatedPortPath('litevna')).toBe('sim:litevna');
    expect(simulatedVariantOf('sim:litevna')).toBe('litevna');
    expect(simulatedVariantOf('sim:bogus')).toBeNull();
    expect(simulatedVariantOf('/dev/ttyACM0')).toBeNull();
  });
});
