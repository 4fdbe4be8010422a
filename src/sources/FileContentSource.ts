/**
 * File-backed content source, watched with chokidar.
 */

import { readFile } from 'node:fs/promises';
import chokidar, { type FSWatcher } from 'chokidar';
import createDebug from 'debug';
import type { ContentSource } from './ContentSource.ts';

const debug = createDebug('handwire:file-source');

export class FileContentSource implements ContentSource {
  readonly name: string;
  private _path: string;
  private _watcher: FSWatcher | null = null;
  private _current: Buffer = Buffer.alloc(0);

  constructor(path: string) {
    this._path = path;
    this.name = `file:${path}`;
  }

  /**
   * Content as of the last successful load.
   */
  get current(): Buffer {
    return this._current;
  }

  subscribe(cb: () => void): void {
    if (this._watcher) {
      this._watcher.on('change', () => cb());
      return;
    }
    this._watcher = chokidar.watch(this._path, {
      ignoreInitial: true,
      persistent: true,
    });
    this._watcher.on('change', () => {
      debug('%s changed', this._path);
      cb();
    });
    this._watcher.on('error', (err) => debug('watch error on %s: %o', this._path, err));
  }

  async load(): Promise<Buffer> {
    this._current = await readFile(this._path);
    debug('loaded %d bytes from %s', this._current.length, this._path);
    return this._current;
  }

  async close(): Promise<void> {
    if (!this._watcher) return;
    const watcher = this._watcher;
    this._watcher = null;
    await watcher.close();
  }
}
