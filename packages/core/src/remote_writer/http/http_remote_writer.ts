/**
 * HttpRemoteWriter - Files API RemoteWriter
 *
 * One `PUT {host}{filesApiPath}{volumePath}/{relativePath}?overwrite=true`
 * per file, body = raw bytes, `Authorization: Bearer <token>`. Any 2xx is a
 * success; read errors, network errors and other statuses are failures.
 *
 * @module remote_writer/http/http_remote_writer
 */

import { readFile } from 'fs/promises';
import type { RemoteWriter, UploadResult } from '../remote_writer';
import { RemoteWriterError } from '../remote_writer';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';

export type FetchFn = typeof fetch;

export type HttpRemoteWriterOptions = {
  /** Workspace host, e.g. https://adb-123.azuredatabricks.net */
  host: string;
  /** Bearer token */
  token: string;
  /** Destination volume, e.g. /Volumes/catalog/schema/volume */
  volumePath: string;
  /** Files API prefix. Default: /api/2.0/fs/files */
  filesApiPath?: string;
  /** Per-request timeout in milliseconds. Default: 60000 */
  timeoutMs?: number;
  /** Default: global fetch */
  fetch?: FetchFn;
  logger?: Logger;
};

const DEFAULT_FILES_API_PATH = '/api/2.0/fs/files';
const DEFAULT_UPLOAD_TIMEOUT_MS = 60_000;

function trimTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, '');
}

function withLeadingSlash(value: string): string {
  if (value === '') return '';
  return value.startsWith('/') ? value : `/${value}`;
}

/**
 * Encodes each segment of a relative path, keeping `/` as the separator.
 */
export function encodeRemotePath(relativePath: string): string {
  return relativePath
    .replace(/\\/g, '/')
    .split('/')
    .filter(segment => segment.length > 0)
    .map(encodeURIComponent)
    .join('/');
}

export class HttpRemoteWriter implements RemoteWriter {
  private readonly host: string;
  private readonly token: string;
  private readonly volumePath: string;
  private readonly filesApiPath: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(options: HttpRemoteWriterOptions) {
    if (!options.host) {
      throw new RemoteWriterError('host is required for HttpRemoteWriter');
    }
    if (!options.token) {
      throw new RemoteWriterError('token is required for HttpRemoteWriter');
    }

    this.host = trimTrailingSlashes(options.host);
    this.token = options.token;
    this.volumePath = withLeadingSlash(trimTrailingSlashes(options.volumePath));
    this.filesApiPath = withLeadingSlash(trimTrailingSlashes(options.filesApiPath ?? DEFAULT_FILES_API_PATH));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_UPLOAD_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? fetch;
    this.logger = options.logger ?? createLogger('[RemoteWriter] ');
  }

  /**
   * Full URL a relative path is written to.
   */
  urlFor(remoteRelativePath: string): string {
    return `${this.host}${this.filesApiPath}${this.volumePath}/${encodeRemotePath(remoteRelativePath)}?overwrite=true`;
  }

  async upload(localPath: string, remoteRelativePath: string): Promise<UploadResult> {
    let body: Buffer;
    try {
      body = await readFile(localPath);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Upload failed for ${remoteRelativePath}: cannot read ${localPath}: ${message}`);
      return { success: false, code: 'READ_ERROR', error: message };
    }

    let response: Response;
    try {
      response = await this.fetchFn(this.urlFor(remoteRelativePath), {
        method: 'PUT',
        headers: {
          Authorization: `Bearer ${this.token}`,
          'Content-Type': 'application/octet-stream',
        },
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Upload failed for ${remoteRelativePath}: ${message}`);
      return { success: false, code: 'NETWORK_ERROR', error: message };
    }

    if (!response.ok) {
      const detail = await readErrorBody(response);
      const message = `HTTP ${response.status} ${response.statusText}${detail ? `: ${detail}` : ''}`;
      this.logger.error(`Upload failed for ${remoteRelativePath}: ${message}`);
      return { success: false, code: 'HTTP_ERROR', error: message, status: response.status };
    }

    return { success: true, status: response.status };
  }
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    return (await response.text()).trim().slice(0, 500);
  } catch {
    return '';
  }
}
