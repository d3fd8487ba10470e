import { describe, it, expect, beforeEach, vi } from 'vitest';

// Mock SerialPort before importing
const serialMock = vi.hoisted(() => {
  type Callback = (err?: Error | null) => void;
  type Listener = (...args: unknown[]) => void;

  class MockSerialPort {
    static instances: MockSerialPort[] = [];
    static openError: Error | null = null;
    static list = vi.fn(async () => [
      { path: '/dev/tty.usbmodem401', manufacturer: 'ChibiOS/RT Virtual COM Port' },
      { path: '/dev/ttyACM0', manufacturer: undefined },
    ]);

    readonly listeners = new Map<string, Listener[]>();
    open = vi.fn((cb: Callback) => cb(MockSerialPort.openError));
    close = vi.fn((cb: Callback) => cb(null));
    write = vi.fn((_data: Buffer, cb: Callback) => cb(null));
    drain = vi.fn((cb: Callback) => cb(null));
    flush = vi.fn((cb: Callback) => cb(null));

    constructor(readonly options: Record<string, unknown>) {
      MockSerialPort.instances.push(this);
    }

    on(event: string, listener: Listener): this {
      this.listeners.set(event, [...(this.listeners.get(event) ?? []), listener]);
      return this;
    }

    removeAllListeners(): this {
      this.listeners.clear();
      return this;
    }

    emit(event: string, ...args: unknown[]): void {
      for (const listener of this.listeners.get(event) ?? []) listener(...args);
    }
  }

  return { MockSerialPort };
});

vi.mock('serialport', () => ({ SerialPort: serialMock.MockSerialPort }));

import { createSerialTransport, listSerialPorts } from '../transports/serial.js';

function lastPort() {
  const port = serialMock.MockSerialPort.instances.at(-1);
  if (!port) throw new Error('no SerialPort was constructed');
  return port;
}

describe('Serial Transport', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    serialMock.MockSerialPort.instances = [];
    serialMock.MockSerialPort.openError = null;
  });

  describe('open()', () => {
    it('should open the port with the default line settings', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      const result = await transport.open();

      expect(result.ok).toBe(true);
      expect(lastPort().options).toEqual({
        path: '/dev/test',
        baudRate: 9600,
        dataBits: 8,
        parity: 'none',
        stopBits: 1,
        autoOpen: false,
      });
      expect(lastPort().open).toHaveBeenCalledTimes(1);
      expect(transport.isOpen()).toBe(true);
    });

    it('should be idempotent when already open', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      await transport.open();
      await transport.open();
      expect(serialMock.MockSerialPort.instances).toHaveLength(1);
    });

    it('should return the open error', async () => {
      serialMock.MockSerialPort.openError = new Error('Resource busy');
      const transport = createSerialTransport({ path: '/dev/busy' });

      const result = await transport.open();

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Resource busy');
      expect(transport.isOpen()).toBe(false);
    });
  });

  describe('describe()', () => {
    it('should render the port configuration on one line', () => {
      const transport = createSerialTransport({ path: '/dev/test', baudRate: 115200 });
      expect(transport.describe()).toBe(
        'Port: /dev/test, Baud: 115200, ReadTimeout: 5000ms, Size: 8, Parity: none, StopBits: 1'
      );
    });
  });

  describe('write()', () => {
    it('should write the text and wait for drain', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      await transport.open();

      const result = await transport.write('info\r');

      expect(result).toEqual({ ok: true, value: 5 });
      expect(lastPort().write).toHaveBeenCalledWith(Buffer.from('info\r', 'latin1'), expect.any(Function));
      expect(lastPort().drain).toHaveBeenCalledTimes(1);
    });

    it('should fail with reason closed before open', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      const result = await transport.write('info\r');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.reason).toBe('closed');
    });
  });

  describe('read()', () => {
    it('should return everything buffered so far', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      await transport.open();

      lastPort().emit('data', Buffer.from('info\r\n'));
      lastPort().emit('data', Buffer.from('ch> '));

      expect(await transport.read()).toEqual({ ok: true, value: 'info\r\nch> ' });
    });

    it('should wait for the next chunk', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      await transport.open();

      const pending = transport.read();
      await new Promise(resolve => setImmediate(resolve));
      lastPort().emit('data', Buffer.from('2> '));

      expect(await pending).toEqual({ ok: true, value: '2> ' });
    });

    it('should time out when nothing arrives', async () => {
      const transport = createSerialTransport({ path: '/dev/test', readTimeoutMs: 10 });
      await transport.open();

      const result = await transport.read();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.reason).toBe('timeout');
        expect(result.error.message).toBe('Read timeout after 10ms on /dev/test');
      }
    });
  });

  describe('discardInput()', () => {
    it('should drop buffered bytes and flush the port', async () => {
      const transport = createSerialTransport({ path: '/dev/test', readTimeoutMs: 10 });
      await transport.open();
      lastPort().emit('data', Buffer.from('stale'));

      const result = await transport.discardInput();

      expect(result.ok).toBe(true);
      expect(lastPort().flush).toHaveBeenCalledTimes(1);
      const read = await transport.read();
      expect(read.ok).toBe(false);
      if (!read.ok) expect(read.error.reason).toBe('timeout');
    });
  });

  describe('disconnection detection', () => {
    it('should mark as disconnected on close event', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      await transport.open();
      expect(transport.isOpen()).toBe(true);

      lastPort().emit('close');

      expect(transport.isOpen()).toBe(false);
      const result = await transport.read();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.reason).toBe('closed');
        expect(result.error.message).toBe('SERIAL_PORT_DISCONNECTED: Port closed');
      }
    });

    it('should mark as disconnected on error event', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      await transport.open();

      lastPort().emit('error', new Error('USB cable unplugged'));

      expect(transport.isOpen()).toBe(false);
      const result = await transport.write('info\r');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.reason).toBe('io');
        expect(result.error.message).toBe('SERIAL_PORT_ERROR: USB cable unplugged');
      }
    });
  });

  describe('close()', () => {
    it('should remove listeners and close the port', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      await transport.open();
      const port = lastPort();

      const result = await transport.close();

      expect(result.ok).toBe(true);
      expect(port.close).toHaveBeenCalledTimes(1);
      expect(port.listeners.size).toBe(0);
      expect(transport.isOpen()).toBe(false);
    });
  });
});

describe('listSerialPorts', () => {
  it('should prefer the macOS call-out device', async () => {
    expect(await listSerialPorts()).toEqual([
      { path: '/dev/cu.usbmodem401', manufacturer: 'ChibiOS/RT Virtual COM Port' },
      { path: '/dev/ttyACM0', manufacturer: undefined },
    ]);
  });
});
