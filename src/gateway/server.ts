// ═══════════════════════════════════════════════════════════════
// Gateway :: Server
// HTTP API + WebSocket feed of bus and orchestrator events
// ═══════════════════════════════════════════════════════════════

import express, { type ErrorRequestHandler, type Request, type Response } from 'express';
import http from 'http';
import { v4 as uuid } from 'uuid';
import { WebSocket, WebSocketServer } from 'ws';
import { CONFIG } from '../core/config.js';
import type { EventBus } from '../core/event-bus.js';
import type { DomainEvent } from '../core/events.js';
import type { Orchestrator } from '../core/orchestrator.js';
import type { EscalationEntry, LoggerHandle, WorkflowRun } from '../core/types.js';
import type { AuditTrail } from '../protocols/audit-trail.js';
import { createApiRoutes } from './routes.js';

export interface GatewayDependencies {
  orchestrator: Orchestrator;
  bus: EventBus;
  audit: AuditTrail;
}

export interface GatewayOptions {
  host?: string;
  port?: number;
  heartbeatMs?: number;
}

/** One message on the /ws feed */
export interface FeedMessage {
  id: string;
  channel: string;
  payload: unknown;
  timestamp: Date;
}

interface ConnectedClient {
  id: string;
  ws: WebSocket;
  connectedAt: Date;
  lastPing: Date;
}

export class GatewayServer {
  private app: express.Application;
  private server: http.Server;
  private wss: WebSocketServer;
  private clients: Map<string, ConnectedClient> = new Map();
  private deps: GatewayDependencies;
  private logger: LoggerHandle;
  private host: string;
  private port: number;
  private heartbeatMs: number;
  private heartbeat: NodeJS.Timeout | null = null;
  private detach: Array<() => void> = [];

  constructor(deps: GatewayDependencies, logger: LoggerHandle, options: GatewayOptions = {}) {
    this.deps = deps;
    this.logger = logger;
    this.host = options.host ?? CONFIG.gateway.host;
    this.port = options.port ?? CONFIG.gateway.port;
    this.heartbeatMs = options.heartbeatMs ?? 30000;

    this.app = express();
    this.app.use(express.json());

    this.server = http.createServer(this.app);
    this.wss = new WebSocketServer({ server: this.server, path: '/ws' });

    this.setupHTTPRoutes();
    this.setupWebSocket();
    this.forwardEvents();
  }

  // ── HTTP API Routes ──

  private setupHTTPRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({
        status: 'operational',
        uptime: process.uptime(),
        clients: this.clients.size,
        timestamp: new Date().toISOString(),
      });
    });

    this.app.use(createApiRoutes({ ...this.deps, logger: this.logger }));

    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found' });
    });

    // Malformed JSON bodies land here
    const onError: ErrorRequestHandler = (err, _req, res, _next) => {
      const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' ? err.status : 500;
      if (status >= 500) this.logger.error(`Gateway error: ${String(err)}`);
      res.status(status).json({ error: status === 400 ? 'Malformed request body' : 'Internal error' });
    };
    this.app.use(onError);
  }

  // ── WebSocket ──

  private setupWebSocket(): void {
    this.wss.on('connection', (ws, req) => {
      const client: ConnectedClient = {
        id: uuid(),
        ws,
        connectedAt: new Date(),
        lastPing: new Date(),
      };

      this.clients.set(client.id, client);
      this.logger.info(`WS client connected: ${client.id} from ${req.socket.remoteAddress}`);
      this.send(client, 'system', { event: 'connected', clientId: client.id });

      ws.on('close', () => {
        this.clients.delete(client.id);
        this.logger.info(`WS client disconnected: ${client.id}`);
      });

      ws.on('pong', () => {
        client.lastPing = new Date();
      });
    });
  }

  private forwardEvents(): void {
    const { bus, orchestrator } = this.deps;

    const onEvent = (event: DomainEvent) => this.broadcast('event', event);
    bus.on('event', onEvent);
    this.detach.push(() => bus.off('event', onEvent));

    const workflowChannels = ['workflow:started', 'workflow:completed', 'workflow:failed'] as const;
    for (const channel of workflowChannels) {
      const forward = (run: WorkflowRun) => this.broadcast(channel, run);
      orchestrator.on(channel, forward);
      this.detach.push(() => orchestrator.off(channel, forward));
    }

    const onEscalation = (entry: EscalationEntry) => this.broadcast('escalation:created', entry);
    orchestrator.on('escalation:created', onEscalation);
    this.detach.push(() => orchestrator.off('escalation:created', onEscalation));
  }

  // ── Broadcast ──

  broadcast(channel: string, payload: unknown): void {
    for (const client of this.clients.values()) {
      this.send(client, channel, payload);
    }
  }

  private send(client: ConnectedClient, channel: string, payload: unknown): void {
    if (client.ws.readyState !== WebSocket.OPEN) return;
    const msg: FeedMessage = { id: uuid(), channel, payload, timestamp: new Date() };
    client.ws.send(JSON.stringify(msg));
  }

  // ── Lifecycle ──

  /** Resolves with the bound port; port 0 picks a free one */
  async start(): Promise<number> {
    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.port, this.host, () => {
        this.server.off('error', reject);
        resolve();
      });
    });

    const address = this.server.address();
    const port = typeof address === 'object' && address !== null ? address.port : this.port;

    this.heartbeat = setInterval(() => {
      for (const [id, client] of this.clients) {
        if (client.ws.readyState === WebSocket.OPEN) client.ws.ping();
        else this.clients.delete(id);
      }
    }, this.heartbeatMs);
    this.heartbeat.unref();

    this.logger.info(`Gateway listening on ${this.host}:${port}`);
    this.logger.info(`  HTTP API: http://${this.host}:${port}/api`);
    this.logger.info(`  WebSocket: ws://${this.host}:${port}/ws`);
    return port;
  }

  async stop(): Promise<void> {
    if (this.heartbeat) clearInterval(this.heartbeat);
    this.heartbeat = null;
    this.detach.forEach(off => off());
    this.detach = [];

    for (const client of this.clients.values()) {
      client.ws.close(1001, 'Server shutting down');
    }
    this.clients.clear();

    await new Promise<void>((resolve, reject) => {
      this.wss.close(() => {
        this.server.closeAllConnections();
        this.server.close(err => (err ? reject(err) : resolve()));
      });
    });
    this.logger.info('Gateway stopped');
  }

  getClientCount(): number {
    return this.clients.size;
  }

  getApp(): express.Application {
    return this.app;
  }
}
