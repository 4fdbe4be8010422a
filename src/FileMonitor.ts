/**
 * FileMonitor - pushes a file's content to every connected viewer.
 *
 * Plain HTTP requests get a page showing the current content; WebSocket peers
 * receive the full new content each time the file changes.
 */

import { basename } from 'node:path';
import createDebug from 'debug';
import { WebSocketServer } from './Server.ts';
import { htmlResponse, renderMonitorPage } from './page.ts';
import { FileContentSource } from './sources/FileContentSource.ts';
import type { ContentSource } from './sources/ContentSource.ts';
import type { ServerTransport } from './transports/ServerTransport.ts';

const debug = createDebug('handwire:file-monitor');

export interface FileMonitorOptions {
  host?: string;
  port?: number;
  /** Source override (default: watch `path` with chokidar) */
  source?: ContentSource;
  serverTransport?: ServerTransport;
}

export class FileMonitor {
  readonly path: string;
  private _source: ContentSource;
  private _content: Buffer = Buffer.alloc(0);
  private _server: WebSocketServer | null = null;

  constructor(path: string, private _options: FileMonitorOptions = {}) {
    this.path = path;
    this._source = _options.source ?? new FileContentSource(path);
  }

  /**
   * Content most recently loaded from the file.
   */
  get content(): Buffer {
    return this._content;
  }

  get server(): WebSocketServer | null {
    return this._server;
  }

  /**
   * Load the file, then start serving.
   *
   * @throws if the file cannot be read or the port cannot be bound
   */
  async start(): Promise<WebSocketServer> {
    if (this._server) return this._server;
    this._content = await this._source.load();

    const title = `File Monitor: ${basename(this.path)}`;
    const server = new WebSocketServer({
      policy: 'log',
      sources: [this._source],
      httpFallback: () => htmlResponse(renderMonitorPage(this._content.toString('utf8'), title)),
      ...(this._options.host !== undefined ? { host: this._options.host } : {}),
      ...(this._options.port !== undefined ? { port: this._options.port } : {}),
      ...(this._options.serverTransport ? { serverTransport: this._options.serverTransport } : {}),
    });
    server.on('reload', (_name: string, content: Buffer) => {
      this._content = content;
      debug('%s now %d bytes', this.path, content.length);
    });
    this._server = server;

    try {
      await server.ready();
    } catch (err) {
      this._server = null;
      await server.close();
      throw err;
    }
    return server;
  }

  async stop(): Promise<void> {
    if (!this._server) return;
    const server = this._server;
    this._server = null;
    await server.quit();
  }
}
