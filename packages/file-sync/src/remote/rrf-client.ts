/**
 * RepRapFirmware file manager client.
 *
 * Talks to the controller's HTTP interface:
 *   GET  /rr_connect?password=&time=   authenticate / liveness check
 *   GET  /rr_filelist?dir=&first=      paginated directory listing
 *   GET  /rr_download?name=            file contents
 *   GET  /rr_mkdir?dir=                create directory
 *   GET  /rr_move?old=&new=            rename / move
 *   GET  /rr_delete?name=              delete file or empty directory
 *   POST /rr_upload?name=&time=        upload file contents
 */

import { formatRrfTimestamp, parseFileListPage, sortEntries } from './listing.js';
import { RemoteError } from './types.js';
import type {
  DownloadedFile,
  RemoteEntry,
  RemoteFileManager,
  RemoteListing,
  RrfFileManagerOptions,
} from './types.js';

/** Exact body RRF returns for a successful mutating request */
const NO_ERROR_RESPONSE = '{"err":0}';

const DEFAULT_PORT = 80;
const DEFAULT_MAX_LIST_PAGES = 1000;

interface RawResponse {
  body: Buffer;
  durationMs: number;
}

/**
 * HTTP client for the SD card of a RepRapFirmware controller.
 *
 * @example
 * ```ts
 * const rfm = new RrfFileManager({ domain: 'printer.local' });
 * await rfm.connect('secret');
 * const listing = await rfm.listDirectory('0:/sys');
 * ```
 */
export class RrfFileManager implements RemoteFileManager {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly maxListPages: number;

  constructor(options: RrfFileManagerOptions) {
    this.baseUrl = `http://${options.domain}:${options.port ?? DEFAULT_PORT}`;
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
    this.maxListPages = options.maxListPages ?? DEFAULT_MAX_LIST_PAGES;
  }

  // -------------------------------------------------------------------------
  // Operations used by the sync engine
  // -------------------------------------------------------------------------

  async connect(password: string): Promise<void> {
    const url = this.buildUrl('rr_connect', {
      password,
      time: formatRrfTimestamp(new Date()),
    });
    const { body } = await this.request(url);
    const parsed = this.parseJson(body, url);

    if (
      parsed !== null &&
      typeof parsed === 'object' &&
      'err' in parsed &&
      parsed.err !== 0
    ) {
      throw new RemoteError(`Connection refused by controller (err ${JSON.stringify(parsed.err)})`, url);
    }
  }

  async listDirectory(path: string): Promise<RemoteListing> {
    const entries: RemoteEntry[] = [];
    let first = 0;

    for (let page = 0; page < this.maxListPages; page++) {
      const params: Record<string, string> = { dir: path };
      if (first > 0) {
        params['first'] = String(first);
      }

      const url = this.buildUrl('rr_filelist', params);
      const { body } = await this.request(url);
      const result = parseFileListPage(this.parseJson(body, url));
      if (typeof result === 'string') {
        throw new RemoteError(`Invalid file list for ${path}: ${result}`, url);
      }

      entries.push(...result.files);

      if (result.next <= first) {
        return { directoryPath: path, entries: sortEntries(entries) };
      }
      first = result.next;
    }

    throw new RemoteError(
      `File list for ${path} exceeded ${this.maxListPages} pages`,
      this.buildUrl('rr_filelist', { dir: path })
    );
  }

  async fetchFile(path: string): Promise<DownloadedFile> {
    const { body, durationMs } = await this.request(this.buildUrl('rr_download', { name: path }));
    return { data: body, durationMs };
  }

  // -------------------------------------------------------------------------
  // Mutating operations
  // -------------------------------------------------------------------------

  async mkdir(path: string): Promise<void> {
    await this.perform(`Mkdir ${path}`, this.buildUrl('rr_mkdir', { dir: path }));
  }

  /**
   * Rename or move a file or directory (only within the same volume).
   * With `overwrite` the target is deleted first.
   */
  async move(oldPath: string, newPath: string, overwrite = false): Promise<void> {
    if (overwrite) {
      await this.delete(newPath);
    }
    await this.perform(
      `Rename ${oldPath} to ${newPath}`,
      this.buildUrl('rr_move', { old: oldPath, new: newPath })
    );
  }

  /** Delete a file or an empty directory. */
  async delete(path: string): Promise<void> {
    await this.perform(`Delete ${path}`, this.buildUrl('rr_delete', { name: path }));
  }

  /** Delete a directory together with everything below it. */
  async deleteRecursive(path: string): Promise<void> {
    const listing = await this.listDirectory(path);

    // Directories come first in a sorted listing
    for (const entry of listing.entries) {
      const childPath = `${path}/${entry.name}`;
      if (entry.kind === 'directory') {
        await this.deleteRecursive(childPath);
      } else {
        await this.delete(childPath);
      }
    }

    await this.delete(path);
  }

  /** Upload a file, returning the elapsed milliseconds. */
  async upload(path: string, content: Buffer): Promise<number> {
    const url = this.buildUrl('rr_upload', {
      name: path,
      time: formatRrfTimestamp(new Date()),
    });
    const { body, durationMs } = await this.request(url, {
      method: 'POST',
      headers: { 'Content-Type': 'text/plain' },
      body: new Uint8Array(content),
    });
    this.checkResult(`Uploading file to ${path}`, body, url);
    return durationMs;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private buildUrl(endpoint: string, params: Record<string, string>): string {
    return `${this.baseUrl}/${endpoint}?${new URLSearchParams(params).toString()}`;
  }

  private async request(url: string, init?: RequestInit): Promise<RawResponse> {
    const startTime = Date.now();

    let response: Response;
    try {
      response = await this.fetchFn(url, init);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new RemoteError(`Request failed: ${message}`, url, null, { cause: err });
    }

    if (!response.ok) {
      throw new RemoteError(`HTTP ${response.status} from controller`, url, response.status);
    }

    const body = Buffer.from(await response.arrayBuffer());
    return { body, durationMs: Date.now() - startTime };
  }

  private parseJson(body: Buffer, url: string): unknown {
    try {
      const parsed: unknown = JSON.parse(body.toString('utf-8'));
      return parsed;
    } catch (err) {
      throw new RemoteError('Controller returned malformed JSON', url, null, { cause: err });
    }
  }

  private checkResult(action: string, body: Buffer, url: string): void {
    if (body.toString('utf-8').trim() !== NO_ERROR_RESPONSE) {
      throw new RemoteError(`Failed to perform: ${action}`, url);
    }
  }

  private async perform(action: string, url: string): Promise<void> {
    const { body } = await this.request(url);
    this.checkResult(action, body, url);
  }
}
