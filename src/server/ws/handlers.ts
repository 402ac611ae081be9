/**
 * WebSocket connection handlers
 */

import { WebSocket } from 'ws';
import { ConfigValidationError, isRawObject } from '../../config/validation.js';
import { state, clients } from '../state.js';
import { simulateRequest } from '../services/SimulationService.js';

function send(ws: WebSocket, message: object): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

/**
 * Send initial state to a newly connected client
 */
function sendInitialState(ws: WebSocket): void {
  send(ws, {
    type: 'status',
    data: { status: 'connected', database: state.database !== null, runsCompleted: state.runsCompleted },
  });
}

/**
 * Handle incoming WebSocket message
 */
function handleMessage(ws: WebSocket, data: unknown): void {
  let message: unknown;
  try {
    message = JSON.parse(String(data));
  } catch (error) {
    console.error('[WebSocket] Message parse error:', error);
    send(ws, { type: 'error', data: { message: 'Invalid JSON' } });
    return;
  }
  if (!isRawObject(message)) return;

  switch (message.type) {
    case 'ping':
      send(ws, { type: 'pong' });
      break;
    case 'simulate':
      // run_completed is also broadcast to every client
      try {
        const result = simulateRequest(message);
        send(ws, { type: 'simulate_result', data: result });
      } catch (error) {
        const reason = error instanceof ConfigValidationError ? error.message : 'Simulation failed';
        if (!(error instanceof ConfigValidationError)) console.error('[WebSocket] Simulation error:', error);
        send(ws, { type: 'error', data: { message: reason } });
      }
      break;
    default:
      console.log('[WebSocket] Unknown message type:', message.type);
  }
}

/**
 * Handle client disconnection
 */
function handleClose(ws: WebSocket): void {
  clients.delete(ws);
  console.log(`[WebSocket] Client disconnected (${clients.size} remaining)`);
}

/**
 * Handle WebSocket error
 */
function handleError(ws: WebSocket, error: Error): void {
  console.error('[WebSocket] Error:', error);
  clients.delete(ws);
}

/**
 * Handle new WebSocket connection
 */
export function handleConnection(ws: WebSocket): void {
  clients.add(ws);
  console.log(`[WebSocket] Client connected (${clients.size} total)`);

  sendInitialState(ws);

  ws.on('message', (data) => handleMessage(ws, data));
  ws.on('close', () => handleClose(ws));
  ws.on('error', (error) => handleError(ws, error));
}
