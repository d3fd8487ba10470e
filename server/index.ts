/**
 * VNA Server
 * Express server exposing the connected NanoVNA-family analyzer over HTTP
 */

import { createServer } from 'http';
import express from 'express';
import cors from 'cors';
import { loadConfig } from './config.js';
import { createVnaConnector } from './devices/connector.js';
import { createVnaRoutes } from './api/vna.js';
import { simulatedPortPath } from './devices/simulation/index.js';

const config = loadConfig();

const connector = createVnaConnector({
  baudRate: config.baudRate,
  readTimeoutMs: config.readTimeoutMs,
  simulateVariant: config.simulate ? config.vnaVariant ?? 'v1' : null,
});

// Create Express app
const app = express();
app.use(cors());
app.use(express.json());

app.use('/api/vna', createVnaRoutes(connector));

// Health check
app.get('/api/health', (_req, res) => {
  const driver = connector.current();
  res.json({
    status: 'ok',
    connected: driver !== null,
    variant: driver?.getVariant() ?? null,
  });
});

const server = createServer(app);

// Start server
async function start(): Promise<void> {
  console.log('VNA Server starting...');
  console.log(`  Port: ${config.vnaPort ?? (config.simulate ? 'simulated' : 'auto')}`);
  console.log(`  Variant: ${config.vnaVariant ?? 'detect'}`);
  console.log('');

  const path = config.vnaPort ?? (config.simulate ? simulatedPortPath(config.vnaVariant ?? 'v1') : undefined);
  const result = await connector.connect({ path, variant: config.vnaVariant ?? undefined });
  if (result.ok) {
    console.log(`[Server] Analyzer ready on ${result.value.portPath}`);
  } else {
    // Not fatal: POST /api/vna/connect can retry later
    console.log(`[Server] No analyzer connected: ${result.error.message}`);
  }

  server.listen(config.port, () => {
    console.log('');
    console.log(`Server running on http://localhost:${config.port}`);
    console.log('');
    console.log('REST API endpoints:');
    console.log('  GET  /api/vna                - Session state');
    console.log('  GET  /api/vna/ports          - List serial ports');
    console.log('  POST /api/vna/connect        - Connect { path?, variant? }');
    console.log('  POST /api/vna/disconnect     - Disconnect');
    console.log('  GET  /api/vna/info           - Device info');
    console.log('  POST /api/vna/sweep/config   - Configure sweep');
    console.log('  POST /api/vna/sweep          - Run sweep');
  });
}

// Graceful shutdown
async function shutdown(): Promise<void> {
  console.log('Shutting down...');
  const closed = await connector.disconnect();
  if (!closed.ok) {
    console.error('[Server] Failed to close analyzer:', closed.error.message);
  }
  server.close(() => {
    console.log('Server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());

start().catch(err => {
  console.error('[Server] Failed to start:', err);
  process.exit(1);
});
