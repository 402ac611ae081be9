/**
 * API Server
 * HTTP + WebSocket server for running farm year scenarios
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { WebSocketServer } from 'ws';

// Import shared state and router
import { state, config } from './state.js';
import { createRouter } from './routes/index.js';
import { setCorsHeaders, handleCorsPreflightIfNeeded, sendError } from './utils/http.js';
import { handleConnection } from './ws/handlers.js';
import { closeDatabase, initializeDatabase } from './services/DatabaseService.js';

// ============================================================================
// Router Setup
// ============================================================================

const router = createRouter();

// ============================================================================
// HTTP Server
// ============================================================================

function handleRequest(req: IncomingMessage, res: ServerResponse): void {
  setCorsHeaders(res);

  if (handleCorsPreflightIfNeeded(req, res)) {
    return;
  }

  const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);

  // Try the router first
  if (router.handle(req, res, url.pathname)) {
    return;
  }

  // 404 fallback
  sendError(res, 404, 'Not found');
}

// ============================================================================
// Main
// ============================================================================

const server = createServer(handleRequest);
const wss = new WebSocketServer({ server, path: '/ws' });

wss.on('connection', handleConnection);

// Initialize database on startup
initializeDatabase();

server.listen(config.PORT, () => {
  console.log('='.repeat(50));
  console.log('Farm Year Simulation API Server');
  console.log('='.repeat(50));
  console.log(`HTTP:      http://localhost:${config.PORT}`);
  console.log(`WebSocket: ws://localhost:${config.PORT}/ws`);
  console.log(`Database:  ${state.database ? config.DB_PATH : 'Disabled'}`);
  console.log(`Day log:   ${config.LOG_DAYS ? 'Enabled' : 'Disabled'}`);
  console.log('='.repeat(50));
});

process.on('SIGINT', () => {
  console.log('\n[Server] Shutting down...');
  closeDatabase();
  wss.close();
  server.close();
  process.exit(0);
});
