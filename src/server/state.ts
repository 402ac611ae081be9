/**
 * Server state and configuration
 * Centralized state management for the API server
 */

import dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });

import { WebSocket } from 'ws';
import type { SimulationDatabase } from '../storage/index.js';

// ============================================================================
// Types
// ============================================================================

export interface ServerState {
  database: SimulationDatabase | null;
  runsCompleted: number;
}

// ============================================================================
// Configuration
// ============================================================================

export const config = {
  PORT: parseInt(process.env.PORT || '3001', 10),
  DB_PATH: process.env.DB_PATH || 'farm-year.db',
  DB_ENABLED: process.env.DB_ENABLED !== 'false',
  LOG_DAYS: process.env.LOG_DAYS === 'true',
};

// ============================================================================
// Server State
// ============================================================================

export const state: ServerState = {
  database: null,
  runsCompleted: 0,
};

// ============================================================================
// WebSocket Clients
// ============================================================================

export const clients = new Set<WebSocket>();

/**
 * Broadcast a message to all connected WebSocket clients
 */
export function broadcast(message: object): void {
  const data = JSON.stringify(message);
  for (const client of clients) {
    if (client.readyState === WebSocket.OPEN) {
      client.send(data);
    }
  }
}
