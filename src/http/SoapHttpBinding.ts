/**
 * SOAP over HTTP
 *
 * Purpose: Express front end for a SoapDispatcher.
 *
 * Key behaviors:
 * - Accept POST and M-POST with some XML content type; GET ?WSDL returns
 *   the configured WSDL text
 * - Read the body raw and decode it with the charset of the content type
 * - Map the dispatch result onto the HTTP status line, a `Warning: 199`
 *   header and either an XML or a plain text body
 * - Never let an exception escape: anything unexpected is a 500
 */

import { createServer, Server } from 'http';
import type { AddressInfo } from 'net';
import express, { Express, NextFunction, Request, Response } from 'express';
import { getDaemonConfig } from '../config/DaemonConfig.js';
import { extractSoapAction, headerAccessor } from '../daemon/ActionExtractor.js';
import type { DispatchResult, SoapDispatcher } from '../daemon/Dispatcher.js';
import { internalError, methodNotAllowed, notAcceptable } from '../daemon/FaultSynthesizer.js';
import type { FaultDescriptor } from '../daemon/FaultSynthesizer.js';
import { getLogger, registerComponent } from '../logging/index.js';

registerComponent('http', 'SOAP HTTP binding');
const logger = getLogger('http');

export const XML_CONTENT_TYPE = 'text/xml; charset="utf-8"';
export const TEXT_CONTENT_TYPE = 'text/plain; charset="utf-8"';
export const WSDL_CONTENT_TYPE = 'application/wsdl+xml; charset="utf-8"';

export interface SoapAppOptions {
  /** WSDL text answered on `GET ?WSDL` */
  wsdl?: string;
  /** Called before the message is dispatched */
  preprocess?: (req: Request) => void;
  /** Called once the response headers are set, before the body is written */
  postprocess?: (req: Request, res: Response, result: DispatchResult) => void;
  /** Largest accepted body (default from SOAP_BODY_LIMIT) */
  bodyLimit?: string;
  /** Server header (default from SOAP_SERVER_NAME) */
  serverName?: string;
}

function isPostMethod(method: string): boolean {
  return method === 'POST' || method === 'M-POST';
}

/**
 * Charset parameter of a content type, utf-8 when missing or unknown.
 */
export function decodeBody(body: Buffer, contentType: string | undefined): string {
  const charset = /charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType ?? '')?.[1] ?? 'utf-8';
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch (error) {
    logger.debug(`unknown charset '${charset}', decoding as utf-8`, { error: String(error) });
    decoder = new TextDecoder('utf-8');
  }
  return decoder.decode(body);
}

function sendStatusLine(res: Response, status: number, statusText: string): void {
  res.status(status);
  res.statusMessage = statusText;
  res.setHeader('Warning', `199 ${statusText}`);
}

function sendText(res: Response, status: number, statusText: string, message: string): void {
  sendStatusLine(res, status, statusText);
  res.setHeader('Content-Type', TEXT_CONTENT_TYPE);
  res.end(`[${status}] ${message}\n`);
}

function sendFault(res: Response, fault: FaultDescriptor): void {
  sendText(res, fault.status, fault.reason, fault.message);
}

/**
 * Build the express application answering SOAP requests on any path.
 */
export function createSoapApp(dispatcher: SoapDispatcher, options: SoapAppOptions = {}): Express {
  const config = getDaemonConfig();
  const serverName = options.serverName ?? config.serverName;

  const app = express();
  app.disable('x-powered-by');

  app.use((req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Server', serverName);
    if (req.method.startsWith('M-')) {
      res.setHeader('Ext', '');
    }

    if (req.method === 'GET' && options.wsdl !== undefined) {
      const wantsWsdl = Object.keys(req.query).some((key) => key.toLowerCase() === 'wsdl');
      if (wantsWsdl) {
        res.status(200).setHeader('Content-Type', WSDL_CONTENT_TYPE);
        res.end(options.wsdl);
        return;
      }
    }

    if (!isPostMethod(req.method)) {
      sendFault(res, methodNotAllowed(req.method));
      return;
    }

    const contentType = req.headers['content-type'] ?? '';
    if (!contentType.toLowerCase().includes('xml')) {
      sendFault(res, notAcceptable(contentType));
      return;
    }

    next();
  });

  app.use(express.raw({ type: () => true, limit: options.bodyLimit ?? config.bodyLimit }));

  app.use((req: Request, res: Response) => {
    const body: unknown = req.body;
    const text = decodeBody(Buffer.isBuffer(body) ? body : Buffer.alloc(0), req.headers['content-type']);
    const action = extractSoapAction(req.method, headerAccessor(req.headers));

    options.preprocess?.(req);
    const result = dispatcher.dispatch(text, action, req);
    logger.debug(`${req.method} ${req.path} -> ${result.status} ${result.statusText}`, {
      operation: result.operation,
    });

    sendStatusLine(res, result.status, result.statusText);
    const payload = result.payload;
    if (typeof payload === 'string') {
      res.setHeader('Content-Type', TEXT_CONTENT_TYPE);
      options.postprocess?.(req, res, result);
      res.end(`[${result.status}] ${payload}\n`);
      return;
    }

    res.setHeader('Content-Type', XML_CONTENT_TYPE);
    options.postprocess?.(req, res, result);
    res.end(payload.toString(result.status !== 200));
  });

  // Body read failures (too large, aborted) and anything thrown above
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err);
    if (status !== undefined && status < 500) {
      logger.debug(`request body rejected: ${String(err)}`);
      sendText(res, status, 'request rejected', err instanceof Error ? err.message : String(err));
      return;
    }
    logger.error(`${req.method} ${req.path} failed`, err instanceof Error ? err : new Error(String(err)));
    if (res.headersSent) {
      res.end();
      return;
    }
    sendFault(res, internalError(err));
  });

  return app;
}

function errorStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export interface SoapHttpServerOptions extends SoapAppOptions {
  host?: string;
  port?: number;
  /** Per-request time limit in ms */
  clientTimeout?: number;
  /** Requests per connection */
  clientMaxRequests?: number;
}

/**
 * HTTP server running createSoapApp().
 */
export class SoapHttpServer {
  private readonly app: Express;
  private server: Server | null = null;
  private readonly options: SoapHttpServerOptions;

  constructor(dispatcher: SoapDispatcher, options: SoapHttpServerOptions = {}) {
    this.options = options;
    this.app = createSoapApp(dispatcher, options);
  }

  getApp(): Express {
    return this.app;
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  /**
   * Start listening; resolves with the bound address.
   */
  async start(): Promise<{ host: string; port: number }> {
    if (this.server) {
      return this.address(this.server);
    }

    const config = getDaemonConfig();
    const host = this.options.host ?? config.host;
    const port = this.options.port ?? config.port;

    const server = createServer(this.app);
    server.requestTimeout = this.options.clientTimeout ?? config.clientTimeout;
    server.maxRequestsPerSocket = this.options.clientMaxRequests ?? config.clientMaxRequests;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.server = server;
    const address = this.address(server);
    logger.info(`listening on ${address.host}:${address.port}`);
    return address;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
      server.closeIdleConnections();
    });
    this.server = null;
    logger.info('stopped');
  }

  private address(server: Server): { host: string; port: number } {
    const address: string | AddressInfo | null = server.address();
    if (address !== null && typeof address === 'object') {
      return { host: address.address, port: address.port };
    }
    return { host: this.options.host ?? '', port: this.options.port ?? 0 };
  }
}
