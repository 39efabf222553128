/**
 * SSE Module - Service Layer
 *
 * Server-Sent Events broadcasting for live views of the monitor.
 */
import { createLogger } from "../logger.js";
import type {
  AlertEvent,
  MonitoringSession,
  SessionEvent,
} from "../monitoring/index.js";
import type { SseEvent } from "./schema.js";
import {
  formatSseEvent,
  formatSseFrame,
  toAlertEvent,
  toPresenceEvent,
} from "./transform.js";

const log = createLogger("sse");
const encoder = new TextEncoder();

// =============================================================================
// Client Management
// =============================================================================

/**
 * SSE client connection.
 */
type SseClient = {
  id: number;
  controller: ReadableStreamDefaultController<Uint8Array>;
  connected: boolean;
};

let clients: SseClient[] = [];
let nextClientId = 1;

/**
 * Get count of connected clients.
 */
export function getClientCount(): number {
  return clients.filter((c) => c.connected).length;
}

/**
 * Create a new SSE stream for a client.
 *
 * @returns ReadableStream for the response and the client's ID
 */
export function createSseStream(): {
  stream: ReadableStream<Uint8Array>;
  clientId: number;
} {
  const clientId = nextClientId++;
  let client: SseClient | null = null;

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      client = {
        id: clientId,
        controller,
        connected: true,
      };
      clients.push(client);
      log.info(
        { clientId, totalClients: getClientCount() },
        "SSE client connected",
      );

      // Send initial connection confirmation
      controller.enqueue(
        encoder.encode(formatSseFrame("connected", { clientId })),
      );
    },
    cancel() {
      if (client) {
        client.connected = false;
        clients = clients.filter((c) => c.id !== clientId);
        log.info(
          { clientId, remainingClients: getClientCount() },
          "SSE client disconnected",
        );
      }
    },
  });

  return { stream, clientId };
}

/**
 * Remove a client by ID and end its stream.
 */
export function removeClient(clientId: number): void {
  const client = clients.find((c) => c.id === clientId);
  if (!client) return;

  client.connected = false;
  clients = clients.filter((c) => c.id !== clientId);
  try {
    client.controller.close();
  } catch (error) {
    log.debug(
      { clientId, error: error instanceof Error ? error.message : String(error) },
      "SSE stream already closed",
    );
  }
  log.debug({ clientId, remainingClients: getClientCount() }, "SSE client removed");
}

// =============================================================================
// Event Broadcasting
// =============================================================================

/**
 * Broadcast an event to all connected clients.
 */
export function broadcast(event: SseEvent): void {
  const connectedClients = clients.filter((c) => c.connected);

  if (connectedClients.length === 0) {
    log.debug({ eventType: event.type }, "No clients to broadcast to");
    return;
  }

  const data = encoder.encode(formatSseEvent(event));

  let successCount = 0;
  let errorCount = 0;

  for (const client of connectedClients) {
    try {
      client.controller.enqueue(data);
      successCount++;
    } catch (error) {
      // Client disconnected
      client.connected = false;
      errorCount++;
      log.debug(
        { clientId: client.id, error: error instanceof Error ? error.message : String(error) },
        "SSE enqueue failed",
      );
    }
  }

  // Clean up disconnected clients
  if (errorCount > 0) {
    clients = clients.filter((c) => c.connected);
    log.debug(
      { eventType: event.type, sent: successCount, failed: errorCount },
      "Broadcast complete with disconnections",
    );
  }

  log.debug(
    { eventType: event.type, clients: successCount },
    "Event broadcasted",
  );
}

/**
 * Broadcast a presence change or escalation reset.
 */
export function broadcastSessionEvent(
  event: SessionEvent,
  session: MonitoringSession,
): void {
  broadcast(toPresenceEvent(event, session));
}

/**
 * Broadcast an alert.
 */
export function broadcastAlert(alert: AlertEvent): void {
  broadcast(toAlertEvent(alert));
}

/**
 * Send event to a specific client.
 */
export function sendToClient(clientId: number, event: SseEvent): boolean {
  const client = clients.find((c) => c.id === clientId && c.connected);
  if (!client) return false;

  try {
    client.controller.enqueue(encoder.encode(formatSseEvent(event)));
    return true;
  } catch (error) {
    client.connected = false;
    log.debug(
      { clientId, error: error instanceof Error ? error.message : String(error) },
      "SSE send failed",
    );
    return false;
  }
}

// =============================================================================
// Cleanup
// =============================================================================

/**
 * Disconnect all clients (for shutdown).
 */
export function disconnectAllClients(): void {
  log.info({ clientCount: clients.length }, "Disconnecting all SSE clients...");

  for (const client of clients) {
    try {
      client.controller.close();
    } catch (error) {
      log.debug(
        { clientId: client.id, error: error instanceof Error ? error.message : String(error) },
        "SSE stream already closed",
      );
    }
  }

  clients = [];
}
