import express, { Express, Request, Response } from 'express';
import { Server as WebSocketServer } from 'ws';
import * as http from 'http';
import { LightControlError, ParseError, toError } from '../errors';
import { sceneToDocument } from '../persistence/SceneSerializer';
import { OscArgs, type OscArgument, type OscMessage } from '../osc/OscMessage';
import type { CommandError, CommandRouter } from '../mapping/CommandRouter';
import type { RenderLoop } from '../streaming/RenderLoop';
import type { LedBuffer } from '../types';

/** How often frames are pushed to WebSocket clients */
const DEFAULT_FRAME_BROADCAST_INTERVAL = 2;

export interface ApiServerOptions {
  /** Send every n-th rendered frame */
  frameInterval?: number;
}

/**
 * HTTP + WebSocket monitor for an external display.
 *
 * Reads go through the render loop so they see a consistent hierarchy;
 * commands go through the same router as OSC messages.
 */
export class ApiServer {
  private app: Express;
  private server: http.Server;
  private wss: WebSocketServer;
  private loop: RenderLoop;
  private router: CommandRouter;
  private frameInterval: number;

  constructor(loop: RenderLoop, router: CommandRouter, options: ApiServerOptions = {}) {
    this.app = express();
    this.server = http.createServer(this.app);
    this.wss = new WebSocketServer({ server: this.server });
    this.loop = loop;
    this.router = router;
    this.frameInterval = Math.max(1, options.frameInterval ?? DEFAULT_FRAME_BROADCAST_INTERVAL);

    this.setupMiddleware();
    this.setupRoutes();
    this.setupWebSocket();
    this.setupEventListeners();
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(): void {
    this.app.use(express.json());
  }

  /**
   * Setup API routes
   */
  private setupRoutes(): void {
    this.app.get('/api/status', this.getStatus.bind(this));
    this.app.get('/api/scenes', this.getScenes.bind(this));
    this.app.get('/api/scenes/:id', this.getSceneById.bind(this));
    this.app.post('/api/command', this.postCommand.bind(this));
  }

  /**
   * Setup WebSocket for real-time updates
   */
  private setupWebSocket(): void {
    this.wss.on('connection', (ws) => {
      console.log('[API] WebSocket client connected');

      ws.on('close', () => {
        console.log('[API] WebSocket client disconnected');
      });
    });
  }

  /**
   * Broadcast message to all WebSocket clients
   */
  private broadcast(type: string, data: unknown): void {
    if (this.wss.clients.size === 0) return;
    const message = JSON.stringify({ type, data });
    this.wss.clients.forEach((client) => {
      if (client.readyState === client.OPEN) {
        client.send(message);
      }
    });
  }

  /**
   * Setup event listeners for real-time updates
   */
  private setupEventListeners(): void {
    this.loop.on('frame', (frame: LedBuffer, frameNumber: number) => {
      if (frameNumber % this.frameInterval === 0) {
        this.broadcast('frame', frame);
      }
    });

    this.router.on('commandError', (error: CommandError) => {
      this.broadcast('commandError', error);
    });
  }

  private getStatus(req: Request, res: Response): void {
    res.json({ ...this.loop.getStats(), commands: this.router.getStats() });
  }

  private async getScenes(req: Request, res: Response): Promise<void> {
    try {
      const scenes = await this.loop.run('GET /api/scenes', (manager) => ({
        scenes: manager.listScenes(),
        active: manager.activeSceneId,
      }));
      res.json(scenes);
    } catch (error) {
      sendError(res, toError(error));
    }
  }

  private async getSceneById(req: Request, res: Response): Promise<void> {
    try {
      const scene = await this.loop.run(`GET /api/scenes/${req.params.id}`, (manager) =>
        sceneToDocument(manager.getScene(req.params.id))
      );
      res.json({ scene });
    } catch (error) {
      sendError(res, toError(error));
    }
  }

  private async postCommand(req: Request, res: Response): Promise<void> {
    let message: OscMessage;
    try {
      message = parseCommandBody(req.body);
    } catch (error) {
      sendError(res, toError(error));
      return;
    }

    const outcome = await this.router.dispatch(message);
    if (outcome.ok) {
      res.json({ ok: true, replies: outcome.replies.map(replyToJson) });
    } else {
      res.status(statusForCode(outcome.error.code)).json({ ok: false, error: outcome.error });
    }
  }

  /**
   * Start the server
   */
  async start(port: number = 3000): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, () => {
        this.server.off('error', reject);
        resolve();
      });
    });
    console.log(`[API] Monitor listening on http://localhost:${port}/api`);
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    for (const client of this.wss.clients) {
      client.terminate();
    }
    this.wss.close();
    if (!this.server.listening) return;
    await new Promise<void>((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
    console.log('[API] Monitor stopped');
  }
}

/**
 * Convert a `{address, args}` JSON body into an OSC message.
 * Integers become `i`, other numbers `f`, strings `s`, booleans `T`/`F`
 * and null `N`.
 */
export function parseCommandBody(body: unknown): OscMessage {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ParseError('Command body must be an object with address and args');
  }
  const address: unknown = 'address' in body ? body.address : undefined;
  const rawArgs: unknown = 'args' in body ? body.args : [];
  if (typeof address !== 'string' || !address.startsWith('/')) {
    throw new ParseError('Command address must be a string starting with "/"');
  }
  if (!Array.isArray(rawArgs)) {
    throw new ParseError('Command args must be an array');
  }
  return { address, args: rawArgs.map((value: unknown, i) => jsonToArgument(value, i)) };
}

function jsonToArgument(value: unknown, index: number): OscArgument {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Number.isInteger(value) ? OscArgs.int(value) : OscArgs.float(value);
  }
  if (typeof value === 'string') return OscArgs.string(value);
  if (typeof value === 'boolean') return OscArgs.bool(value);
  if (value === null) return OscArgs.nil();
  throw new ParseError(`Command argument ${index} has an unsupported type`);
}

function replyToJson(reply: OscMessage): { address: string; args: unknown[] } {
  return {
    address: reply.address,
    args: reply.args.map((arg) => (arg.type === 'b' ? arg.value.toString('base64') : arg.value)),
  };
}

export function statusForCode(code: string): number {
  switch (code) {
    case 'NOT_FOUND':
      return 404;
    case 'DUPLICATE_ID':
    case 'ACTIVE_SCENE':
      return 409;
    case 'QUEUE_OVERFLOW':
      return 503;
    case 'INTERNAL':
      return 500;
    default:
      return 400;
  }
}

function sendError(res: Response, error: Error): void {
  const code = error instanceof LightControlError ? error.code : 'INTERNAL';
  res.status(statusForCode(code)).json({ ok: false, error: { code, message: error.message } });
}
