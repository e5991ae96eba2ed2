import express, { Express, NextFunction, Request, Response, Router } from 'express';
import { Server as HttpServer, IncomingMessage } from 'http';
import { Duplex } from 'stream';
import { WebSocketServer, WebSocket, RawData } from 'ws';
import cors from 'cors';
import type { IAgentConfigRepository } from '../../core/interfaces/IAgentConfigRepository.js';
import type { IConversationRepository } from '../../core/interfaces/IConversationRepository.js';
import type { ChatKey } from '../../core/entities/Conversation.js';
import {
  AddConfigRequestSchema,
  ConfigLookupSchema,
  parseRequest,
} from '../../core/schemas.js';
import {
  RouteNotFoundError,
  ValidationError,
  toErrorPayload,
  toGatewayError,
} from '../../core/errors.js';
import { AgentService } from '../../application/services/AgentService.js';
import { ChatSession } from '../../application/services/ChatSession.js';
import { generateId } from '../../utils/ids.js';

export interface WebServerDependencies {
  configRepo: IAgentConfigRepository;
  conversationRepo: IConversationRepository;
  agent: AgentService;
  /** Store liveness for /health */
  ping: () => boolean;
}

export interface WebServerOptions {
  port?: number;
  host?: string;
  basePath?: string;
  debugLog?: (message: string) => void;
}

const CHAT_PATH = /^\/chat\/([^/]+)\/([^/]+)\/([^/]+)\/?$/;

/**
 * express.json() reports unreadable bodies as errors carrying a 4xx status
 * (400 parse failure, 413 too large, 415 unsupported charset or encoding).
 */
function toBodyError(error: unknown): unknown {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return error;
  }
  const { status } = error;
  if (typeof status !== 'number' || status < 400 || status >= 500) {
    return error;
  }
  if ('type' in error && error.type === 'entity.parse.failed') {
    return new ValidationError('Request body is not valid JSON');
  }
  return new ValidationError(error instanceof Error ? error.message : 'Invalid request body', status);
}

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer;
  private sessions: Map<WebSocket, ChatSession> = new Map();
  private basePath: string;

  constructor(
    private deps: WebServerDependencies,
    private options: WebServerOptions = {}
  ) {
    this.basePath = options.basePath ?? '';
    this.app = express();
    this.wss = new WebSocketServer({ noServer: true });
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Port actually bound; differs from the option when it was 0
   */
  getPort(): number {
    const address = this.httpServer?.address();
    if (!address || typeof address === 'string') {
      throw new Error('Web server is not listening');
    }
    return address.port;
  }

  getActiveSessionCount(): number {
    return this.sessions.size;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());
  }

  private setupRoutes(): void {
    const router = Router();
    const { configRepo, conversationRepo } = this.deps;

    router.get('/health', (req: Request, res: Response) => {
      const database = this.deps.ping();
      res.status(database ? 200 : 503).json({
        status: database ? 'ok' : 'degraded',
        database,
        activeSessions: this.getActiveSessionCount(),
        timestamp: new Date().toISOString(),
      });
    });

    router.get('/client/list', (req: Request, res: Response) => {
      try {
        res.json({ clients: configRepo.listClients() });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    router.get('/list/:client_id', (req: Request, res: Response) => {
      try {
        res.json({ configs: configRepo.listConfigs(req.params.client_id) });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    router.get('/list/:client_id/:config_id/chats', (req: Request, res: Response) => {
      try {
        const { client_id, config_id } = req.params;
        res.json({ chats: conversationRepo.listChats(client_id, config_id) });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    router.post('/add_config', (req: Request, res: Response) => {
      try {
        const body = parseRequest(AddConfigRequestSchema, req.body);
        const outcome = configRepo.upsertConfig(
          body.client_id,
          body.config_id,
          body.bot_name,
          body.config
        );
        this.debug(`config ${body.client_id}/${body.config_id} ${outcome}`);
        res.json({
          status: 'ok',
          message:
            outcome === 'inserted'
              ? 'Configuration inserted successfully'
              : 'Configuration updated successfully',
        });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    const getConfig = (payload: unknown, res: Response) => {
      try {
        const lookup = parseRequest(ConfigLookupSchema, payload);
        res.json({ config: configRepo.getConfig(lookup.client_id, lookup.config_id) });
      } catch (error) {
        this.sendError(res, error);
      }
    };

    router.get('/get_config', (req: Request, res: Response) => getConfig(req.query, res));
    router.post('/get_config', (req: Request, res: Response) => getConfig(req.body, res));

    router.get('/history/:client_id/:config_id/:chat_id', (req: Request, res: Response) => {
      try {
        const { client_id, config_id, chat_id } = req.params;
        res.json({
          messages: conversationRepo.getHistory({
            clientId: client_id,
            configId: config_id,
            chatId: chat_id,
          }),
        });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    this.app.use(this.basePath || '/', router);

    this.app.use((req: Request, res: Response) => {
      this.sendError(res, new RouteNotFoundError(req.method, req.path));
    });

    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      this.sendError(res, toBodyError(error));
    });
  }

  private sendError(res: Response, error: unknown): void {
    const gatewayError = toGatewayError(error);
    if (gatewayError.status >= 500) {
      console.error('[WebServer] Request failed:', gatewayError);
    }
    res.status(gatewayError.status).json(toErrorPayload(gatewayError));
  }

  private handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const url = new URL(request.url ?? '/', 'http://localhost');
    const path = url.pathname.startsWith(this.basePath)
      ? url.pathname.slice(this.basePath.length)
      : null;
    const match = path === null ? null : CHAT_PATH.exec(path);

    if (!match) {
      this.rejectUpgrade(socket, '404 Not Found');
      return;
    }

    let key: ChatKey;
    try {
      const [clientId, configId, chatId] = match.slice(1).map((part) => decodeURIComponent(part));
      key = { clientId, configId, chatId };
    } catch (error) {
      this.debug(`rejected upgrade for ${url.pathname}: ${String(error)}`);
      this.rejectUpgrade(socket, '400 Bad Request');
      return;
    }

    this.wss.handleUpgrade(request, socket, head, (ws) => {
      this.handleConnection(ws, key);
    });
  }

  private rejectUpgrade(socket: Duplex, status: string): void {
    socket.write(`HTTP/1.1 ${status}\r\nConnection: close\r\n\r\n`);
    socket.destroy();
  }

  private handleConnection(ws: WebSocket, key: ChatKey): void {
    const connectionId = generateId('conn');
    console.log(
      `[WebServer] ${connectionId} connected to ${key.clientId}/${key.configId}/${key.chatId}`
    );

    const session = new ChatSession(
      key,
      {
        send: (frame) => {
          if (ws.readyState === WebSocket.OPEN) {
            ws.send(frame);
          }
        },
        close: (code, reason) => ws.close(code, reason),
      },
      {
        configRepo: this.deps.configRepo,
        conversationRepo: this.deps.conversationRepo,
        agent: this.deps.agent,
        debugLog: this.options.debugLog,
      }
    );
    this.sessions.set(ws, session);

    ws.on('message', (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        this.debug(`${connectionId} ignored binary frame`);
        return;
      }
      void session.receive(data.toString());
    });

    ws.on('close', () => {
      console.log(`[WebServer] ${connectionId} disconnected`);
      session.close();
      this.sessions.delete(ws);
    });

    ws.on('error', (error) => {
      console.error(`[WebServer] ${connectionId} WebSocket error:`, error);
    });

    void session.open();
  }

  private debug(message: string): void {
    this.options.debugLog?.(`[WebServer] ${message}`);
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const port = this.options.port ?? 8000;
      const host = this.options.host ?? '0.0.0.0';

      this.httpServer = this.app.listen(port, host, () => {
        console.log(`[WebServer] Listening on http://${host}:${this.getPort()}${this.basePath}`);
        resolve();
      });

      this.httpServer.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) =>
        this.handleUpgrade(request, socket, head)
      );

      this.httpServer.on('error', (error) => {
        console.error('[WebServer] Server error:', error);
        reject(error);
      });
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      // Close all WebSocket connections
      for (const [ws, session] of this.sessions) {
        session.close();
        ws.terminate();
      }
      this.sessions.clear();
      this.wss.close();

      // A server whose listen() failed has nothing to close
      if (!this.httpServer || !this.httpServer.listening) {
        this.httpServer = null;
        resolve();
        return;
      }

      this.httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        console.log('[WebServer] HTTP server closed');
        resolve();
      });
      this.httpServer = null;
    });
  }
}
