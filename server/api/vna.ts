/**
 * VNA API Routes
 * REST API for the single connected analyzer
 */

import { Router, type Request, type Response } from 'express';
import type { ApiError, HardwareInfo, VnaStatusResponse } from '../../shared/types.js';
import type { VnaDriver, VnaErrorCode } from '../devices/types.js';
import { VnaError } from '../devices/types.js';
import type { ConnectRequest, VnaConnector } from '../devices/connector.js';
import { isHardwareVariant, variantDisplayName } from '../devices/registry.js';

const STATUS_BY_CODE: Record<VnaErrorCode, number> = {
  NOT_CONNECTED: 409,
  OUT_OF_RANGE: 400,
  NO_DEVICE_FOUND: 404,
  UNRECOGNIZED_DEVICE: 422,
  COMMAND_FAILED: 502,
  NO_DATA: 502,
  TRANSPORT_ERROR: 502,
};

export function statusForError(code: VnaErrorCode): number {
  return STATUS_BY_CODE[code];
}

/** Handler outcome, independent of Express */
export interface ApiReply {
  status: number;
  body: unknown;
}

type Body = Record<string, unknown>;

function ok(body: unknown): ApiReply {
  return { status: 200, body };
}

function fail(err: VnaError): ApiReply {
  const body: ApiError & { context?: Record<string, unknown> } = {
    error: err.code,
    message: err.message,
  };
  if (err.context) body.context = err.context;
  return { status: statusForError(err.code), body };
}

function badRequest(message: string): ApiReply {
  const error: ApiError = { error: 'INVALID_REQUEST', message };
  return { status: 400, body: error };
}

function notConnected(): ApiReply {
  return fail(new VnaError('NOT_CONNECTED', 'No analyzer connected'));
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isSlot(value: unknown): value is number {
  return isFiniteNumber(value) && Number.isInteger(value) && value >= 0;
}

function describeHardware(info: HardwareInfo) {
  return {
    variant: info.variant,
    name: variantDisplayName(info.variant),
    frequencyRange: info.frequencyRange,
    maxSweepPoints: info.maxSweepPoints,
    supportedPorts: info.supportedPorts,
    capabilities: info.capabilities,
  };
}

export interface VnaApi {
  listPorts(): Promise<ApiReply>;
  connect(body: Body): Promise<ApiReply>;
  disconnect(): Promise<ApiReply>;
  status(): ApiReply;
  portSupport(port: string): ApiReply;
  info(): Promise<ApiReply>;
  configureSweep(body: Body): Promise<ApiReply>;
  runSweep(): Promise<ApiReply>;
  getCalibration(): Promise<ApiReply>;
  saveCalibration(body: Body): Promise<ApiReply>;
  loadCalibration(body: Body): Promise<ApiReply>;
}

export function createVnaApi(connector: VnaConnector): VnaApi {
  async function calibrationSlot(
    body: Body,
    action: (driver: VnaDriver, slot: number) => ReturnType<VnaDriver['saveCalibration']>
  ): Promise<ApiReply> {
    const { slot } = body;
    if (!isSlot(slot)) return badRequest('slot (non-negative integer) is required');

    const driver = connector.current();
    if (!driver) return notConnected();
    const result = await action(driver, slot);
    return result.ok ? ok({ success: true, slot }) : fail(result.error);
  }

  return {
    async listPorts(): Promise<ApiReply> {
      try {
        return ok({ ports: await connector.listPorts() });
      } catch (err) {
        const error: ApiError = {
          error: 'LIST_FAILED',
          message: err instanceof Error ? err.message : 'Unknown error',
        };
        return { status: 500, body: error };
      }
    },

    async connect(body: Body): Promise<ApiReply> {
      const request: ConnectRequest = {};
      if (body.path !== undefined) {
        if (typeof body.path !== 'string' || body.path.length === 0) {
          return badRequest('path must be a non-empty string');
        }
        request.path = body.path;
      }
      if (body.variant !== undefined) {
        if (typeof body.variant !== 'string' || !isHardwareVariant(body.variant)) {
          return badRequest(`Unknown variant: ${String(body.variant)}`);
        }
        request.variant = body.variant;
      }

      const result = await connector.connect(request);
      if (!result.ok) return fail(result.error);

      const driver = result.value;
      return ok({
        port: driver.portPath,
        version: driver.getVersion(),
        hardware: describeHardware(driver.getHardwareInfo()),
      });
    },

    async disconnect(): Promise<ApiReply> {
      const result = await connector.disconnect();
      return result.ok ? ok({ success: true }) : fail(result.error);
    },

    status(): ApiReply {
      const driver = connector.current();
      if (!driver) {
        const response: VnaStatusResponse = { connected: false, port: null, state: { status: 'closed' } };
        return ok(response);
      }
      const response: VnaStatusResponse & { hardware: ReturnType<typeof describeHardware>; details: string } = {
        connected: driver.getState().status !== 'closed',
        port: driver.portPath,
        state: driver.getState(),
        hardware: describeHardware(driver.getHardwareInfo()),
        details: driver.getPortDetails(),
      };
      return ok(response);
    },

    portSupport(port: string): ApiReply {
      const driver = connector.current();
      if (!driver) return notConnected();
      return ok({ port, supported: driver.isPortSupported(port) });
    },

    async info(): Promise<ApiReply> {
      const driver = connector.current();
      if (!driver) return notConnected();
      const result = await driver.getInfo();
      return result.ok ? ok(result.value) : fail(result.error);
    },

    async configureSweep(body: Body): Promise<ApiReply> {
      const { startHz, stopHz, points } = body;
      if (!isFiniteNumber(startHz) || !isFiniteNumber(stopHz) || !isFiniteNumber(points)) {
        return badRequest('startHz, stopHz and points (numbers) are required');
      }

      const driver = connector.current();
      if (!driver) return notConnected();
      const result = await driver.configureSweep(startHz, stopHz, points);
      return result.ok ? ok({ success: true }) : fail(result.error);
    },

    async runSweep(): Promise<ApiReply> {
      const driver = connector.current();
      if (!driver) return notConnected();
      const result = await driver.runSweep();
      return result.ok ? ok(result.value) : fail(result.error);
    },

    async getCalibration(): Promise<ApiReply> {
      const driver = connector.current();
      if (!driver) return notConnected();
      const result = await driver.getCalibration();
      return result.ok ? ok(result.value) : fail(result.error);
    },

    saveCalibration(body: Body): Promise<ApiReply> {
      return calibrationSlot(body, (driver, slot) => driver.saveCalibration(slot));
    },

    loadCalibration(body: Body): Promise<ApiReply> {
      return calibrationSlot(body, (driver, slot) => driver.loadCalibration(slot));
    },
  };
}

function readBody(req: Request): Body {
  const body: unknown = req.body;
  if (body === null || typeof body !== 'object' || Array.isArray(body)) return {};
  return Object.fromEntries(Object.entries(body));
}

function send(res: Response, reply: ApiReply): void {
  res.status(reply.status).json(reply.body);
}

export function createVnaRoutes(connector: VnaConnector): Router {
  const router = Router();
  const api = createVnaApi(connector);

  // GET /api/vna - Session state and hardware info
  router.get('/', (_req, res) => send(res, api.status()));

  // GET /api/vna/ports - List candidate serial ports
  router.get('/ports', async (_req, res) => send(res, await api.listPorts()));

  // GET /api/vna/ports/:port - Is an S-parameter supported
  router.get('/ports/:port', (req, res) => send(res, api.portSupport(req.params.port)));

  // POST /api/vna/connect - Open (and detect) a device
  router.post('/connect', async (req, res) => send(res, await api.connect(readBody(req))));

  // POST /api/vna/disconnect - Close the device
  router.post('/disconnect', async (_req, res) => send(res, await api.disconnect()));

  // GET /api/vna/info - Model, firmware and serial number
  router.get('/info', async (_req, res) => send(res, await api.info()));

  // POST /api/vna/sweep/config - Set sweep range and points
  router.post('/sweep/config', async (req, res) => send(res, await api.configureSweep(readBody(req))));

  // POST /api/vna/sweep - Run one sweep
  router.post('/sweep', async (_req, res) => send(res, await api.runSweep()));

  // Calibration hooks
  router.get('/calibration', async (_req, res) => send(res, await api.getCalibration()));
  router.post('/calibration/save', async (req, res) => send(res, await api.saveCalibration(readBody(req))));
  router.post('/calibration/load', async (req, res) => send(res, await api.loadCalibration(readBody(req))));

  return router;
}
