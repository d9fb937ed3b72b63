import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import path from 'path';
import { z } from 'zod';
import type { SessionService } from '../../application/services/SessionService.js';
import type { PromptCatalog } from '../../core/catalog/PromptCatalog.js';
import type { IModelClient } from '../../core/interfaces/IModelClient.js';
import type { SessionSnapshot } from '../../core/entities/Session.js';
import type { ModelCatalog } from '../../core/entities/Model.js';
import { ErrorKind, TransformerError, errorMessage, isTransformerError } from '../../core/errors/TransformerError.js';

export interface WebServerOptions {
  host: string;
  port: number;
  defaultModel: string;
  maxUploadBytes: number;
  publicDir?: string;
}

const TextBody = z.object({ text: z.string() });
const IdsBody = z.object({ ids: z.array(z.string()) });
const ModelBody = z.object({ model: z.string().min(1) });
const PathBody = z.object({ path: z.string().min(1) });
const SaveBody = z.object({ filename: z.string().optional() });
const ClearBody = z.object({ target: z.enum(['input', 'output', 'all']) });

const STATUS_BY_KIND: Partial<Record<ErrorKind, number>> = {
  InvalidRequest: 400,
  UnknownTransformation: 400,
  EmptyInput: 400,
  EmptyOutput: 400,
  SessionNotFound: 404,
  ModelNotFound: 404,
  SessionBusy: 409,
  UnsupportedFormat: 415,
  ExtractionFailed: 422,
  GenerationFailed: 502,
  ServiceUnreachable: 503,
};

export function statusForKind(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind] ?? 500;
}

type RouteHandler = (req: Request, res: Response) => Promise<void> | void;

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private publicDir: string;

  constructor(
    private sessionService: SessionService,
    private catalog: PromptCatalog,
    private modelClient: IModelClient,
    private options: WebServerOptions
  ) {
    this.publicDir = options.publicDir ?? path.join(__dirname, '../../../public');
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: this.options.maxUploadBytes }));
    this.app.use(express.static(this.publicDir));
  }

  private setupRoutes(): void {
    // Serve main page
    this.app.get('/', (req: Request, res: Response) => {
      res.sendFile(path.join(this.publicDir, 'index.html'));
    });

    // API: Health of the app and the Ollama connection
    this.app.get('/api/health', this.route(async (req, res) => {
      const models = await this.fetchModels();
      res.json({
        success: true,
        data: {
          status: models.reachable ? 'healthy' : 'degraded',
          timestamp: new Date().toISOString(),
          ollama: { reachable: models.reachable, models: models.models.length },
          prompts: this.catalog.size,
          sessions: this.sessionService.listSessions().length,
        },
      });
    }));

    // API: Models installed on the Ollama server
    this.app.get('/api/models', this.route(async (req, res) => {
      res.json({ success: true, data: await this.fetchModels() });
    }));

    // API: Transformation catalog, categorized or filtered by ?search=
    this.app.get('/api/transformations', this.route((req, res) => {
      const search = typeof req.query.search === 'string' ? req.query.search.trim() : '';
      res.json({
        success: true,
        data: {
          search,
          categories: search ? [] : this.catalog.categorize(),
          prompts: this.catalog.filter(search),
        },
      });
    }));

    // API: Sessions
    this.app.post('/api/sessions', this.route((req, res) => {
      res.status(201).json({ success: true, data: this.sessionService.createSession() });
    }));

    this.app.get('/api/sessions/:id', this.route((req, res) => {
      res.json({ success: true, data: this.sessionService.getSession(req.params.id) });
    }));

    this.app.delete('/api/sessions/:id', this.route((req, res) => {
      this.sessionService.closeSession(req.params.id);
      res.json({ success: true, message: 'Session closed' });
    }));

    this.app.put('/api/sessions/:id/input', this.route((req, res) => {
      const { text } = parseBody(TextBody, req.body);
      res.json({ success: true, data: this.sessionService.updateInput(req.params.id, text) });
    }));

    this.app.put('/api/sessions/:id/output', this.route((req, res) => {
      const { text } = parseBody(TextBody, req.body);
      res.json({ success: true, data: this.sessionService.updateOutput(req.params.id, text) });
    }));

    this.app.put('/api/sessions/:id/transformations', this.route((req, res) => {
      const { ids } = parseBody(IdsBody, req.body);
      res.json({ success: true, data: this.sessionService.selectTransformations(req.params.id, ids) });
    }));

    this.app.put('/api/sessions/:id/model', this.route((req, res) => {
      const { model } = parseBody(ModelBody, req.body);
      res.json({ success: true, data: this.sessionService.selectModel(req.params.id, model) });
    }));

    this.app.put('/api/sessions/:id/download-path', this.route((req, res) => {
      const body = parseBody(PathBody, req.body);
      res.json({ success: true, data: this.sessionService.setDownloadPath(req.params.id, body.path) });
    }));

    // API: Upload a document as the raw request body
    this.app.post(
      '/api/sessions/:id/document',
      express.raw({ type: () => true, limit: this.options.maxUploadBytes }),
      this.route(async (req, res) => {
        if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
          throw new TransformerError('InvalidRequest', 'Upload body is empty');
        }
        const session = await this.sessionService.loadDocument(req.params.id, {
          bytes: req.body,
          filename: queryString(req, 'filename'),
          format: queryString(req, 'format'),
          mimeType: req.get('content-type'),
        });
        res.json({ success: true, data: session });
      })
    );

    this.app.post('/api/sessions/:id/transform', this.route(async (req, res) => {
      res.json({ success: true, data: await this.sessionService.transform(req.params.id) });
    }));

    this.app.post('/api/sessions/:id/save', this.route(async (req, res) => {
      const { filename } = parseBody(SaveBody, req.body ?? {});
      const saved = await this.sessionService.saveOutput(req.params.id, filename);
      res.json({ success: true, data: saved });
    }));

    // API: Output as a browser download
    this.app.get('/api/sessions/:id/download', this.route((req, res) => {
      const session = this.sessionService.getSession(req.params.id);
      if (!session.outputText.trim()) {
        throw new TransformerError('EmptyOutput', 'No transformed text to download.');
      }
      res.attachment(queryString(req, 'filename') || session.suggestedFilename);
      res.type('text/plain');
      res.send(session.outputText);
    }));

    this.app.post('/api/sessions/:id/clear', this.route((req, res) => {
      const { target } = parseBody(ClearBody, req.body);
      res.json({ success: true, data: this.sessionService.clear(req.params.id, target) });
    }));
  }

  private setupErrorHandler(): void {
    // Body parser failures (oversized upload, malformed JSON)
    this.app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      const status = bodyParserStatus(error);
      res.status(status).json({
        success: false,
        error: {
          kind: status === 500 ? 'InternalError' : 'InvalidRequest',
          message: errorMessage(error),
        },
      });
    });
  }

  /**
   * Wrap a handler so thrown errors become the JSON error envelope
   */
  private route(handler: RouteHandler) {
    return async (req: Request, res: Response): Promise<void> => {
      try {
        await handler(req, res);
      } catch (error) {
        if (isTransformerError(error)) {
          res.status(statusForKind(error.kind)).json({ success: false, error: error.toInfo() });
          return;
        }
        console.error(`[WebServer] ${req.method} ${req.path} failed:`, error);
        res.status(500).json({
          success: false,
          error: { kind: 'InternalError', message: errorMessage(error) },
        });
      }
    };
  }

  private async fetchModels(): Promise<ModelCatalog> {
    try {
      const models = await this.modelClient.listModels();
      return { reachable: true, models: models.length > 0 ? models : [this.options.defaultModel] };
    } catch (error) {
      if (!isTransformerError(error)) {
        throw error;
      }
      return { reachable: false, models: [] };
    }
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws: WebSocket) => {
      console.log('[WebServer] New WebSocket client connected');
      this.clients.add(ws);

      ws.on('close', () => {
        console.log('[WebServer] WebSocket client disconnected');
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        console.error('[WebServer] WebSocket error:', error);
        this.clients.delete(ws);
      });

      // Send initial connection confirmation
      ws.send(JSON.stringify({ type: 'connected', timestamp: new Date().toISOString() }));
    });
  }

  public broadcast(message: Record<string, unknown>): void {
    const payload = JSON.stringify(message);
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  public notifySessionUpdate(session: SessionSnapshot): void {
    this.broadcast({
      type: 'session_updated',
      sessionId: session.id,
      session,
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Port actually bound (differs from the configured one when that is 0)
   */
  public getPort(): number {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : this.options.port;
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      try {
        this.httpServer = this.app.listen(this.options.port, this.options.host, () => {
          console.log(`[WebServer] UI available at http://${this.options.host}:${this.getPort()}`);
          this.setupWebSocket();
          resolve();
        });

        this.httpServer.on('error', (error) => {
          console.error('[WebServer] Server error:', error);
          reject(error);
        });
      } catch (error) {
        reject(error);
      }
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      // Close all WebSocket connections
      this.clients.forEach((client) => {
        client.close();
      });
      this.clients.clear();

      // Close WebSocket server
      if (this.wss) {
        this.wss.close(() => {
          console.log('[WebServer] WebSocket server closed');
        });
      }

      // Close HTTP server
      if (this.httpServer) {
        const server = this.httpServer;
        this.httpServer = null;
        server.close(() => {
          console.log('[WebServer] HTTP server closed');
          resolve();
        });
        server.closeAllConnections();
      } else {
        resolve();
      }
    });
  }
}

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((err) => `${err.path.join('.') || 'body'}: ${err.message}`)
      .join('; ');
    throw new TransformerError('InvalidRequest', `Invalid request body (${issues})`);
  }
  return parsed.data;
}

function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function bodyParserStatus(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'type' in error) {
    if (error.type === 'entity.too.large') return 413;
    if (error.type === 'entity.parse.failed') return 400;
  }
  return 500;
}
