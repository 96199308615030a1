/**
 * Portal SDK - Main Client
 *
 * Core client class for interacting with the automation portal API.
 * Uses Node.js built-in fetch, FormData and Blob.
 */

import type { z } from 'zod';

import { parseArtifactFilename, readArtifactContent, type ArtifactSource } from './artifacts.js';
import {
  AuthenticationError,
  ProtocolError,
  RequestError,
  TransportError,
  extractErrorMessage,
} from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { encodeColumns, parseLogEntries } from './logs.js';
import { joinRecipients } from './notifications.js';
import {
  automationTaskSchema,
  createTaskResponseSchema,
  logReadResponseSchema,
  loginResponseSchema,
  serverMessageSchema,
} from './schemas.js';
import { Session } from './session.js';
import { PROCESSED_ITEMS, encodeTaskParameters } from './tasks.js';
import type {
  AlertType,
  Artifact,
  AutomationTask,
  AutomationTaskFinishStatus,
  ClientOptions,
  Column,
  LogEntry,
  MessageParams,
  ServerMessage,
} from './types.js';

export const DEFAULT_TIMEOUT = 30000;

type Method = 'GET' | 'POST';
type Fields = Record<string, string>;
type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export class PortalClient {
  private session: Session;
  private timeout: number;
  private logger: Logger;

  constructor(options: ClientOptions = {}) {
    this.session = new Session(options.server, options.login, options.key);
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.logger = options.logger ?? silentLogger;
  }

  // ------------------------------------------------------------------
  // Session
  // ------------------------------------------------------------------

  get server(): string | null {
    return this.session.server;
  }

  get accessToken(): string | null {
    return this.session.accessToken;
  }

  get isLoggedIn(): boolean {
    return this.session.isLoggedIn;
  }

  configure(server?: string, login?: string, key?: string): void {
    this.session.configure(server, login, key);
  }

  /**
   * Obtain an access token. Arguments given here replace the configured ones.
   * Any previous token is dropped before the request is made.
   */
  async login(server?: string, login?: string, key?: string): Promise<void> {
    this.session.configure(server, login, key);
    const credentials = this.session.credentials();
    this.logoff();

    const response = await this._send('login', 'POST', '/app/api/login', {
      userLogin: credentials.login,
      key: credentials.key,
    });
    const responseText = await this._readText('login', response);

    if (response.status !== 200) {
      throw new AuthenticationError(response.status, responseText);
    }

    const body = this._decode('login', responseText, loginResponseSchema);
    this.session.setToken(body.access_token);
    this.logger.debug('Logged in', { server: credentials.server });
  }

  logoff(): void {
    this.session.logoff();
  }

  // ------------------------------------------------------------------
  // Private request helpers
  // ------------------------------------------------------------------

  private _url(path: string): string {
    return `${this.session.server ?? ''}${path}`;
  }

  private async _send(
    operation: string,
    method: Method,
    path: string,
    fields: Fields,
    multipart?: FormData
  ): Promise<Response> {
    let url = this._url(path);
    let body: URLSearchParams | FormData | undefined;

    if (method === 'GET') {
      url += `?${new URLSearchParams(fields).toString()}`;
    } else if (multipart) {
      for (const [name, value] of Object.entries(fields)) {
        multipart.append(name, value);
      }
      body = multipart;
    } else {
      body = new URLSearchParams(fields);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    let response: Response;
    try {
      response = await fetch(url, { method, body, signal: controller.signal });
    } catch (err) {
      this.logger.error(`${method} ${path} failed`, { operation });
      throw new TransportError(operation, err);
    } finally {
      clearTimeout(timeoutId);
    }

    this.logger.debug(`${method} ${path} -> ${response.status}`, { operation });
    return response;
  }

  private async _readText(operation: string, response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (err) {
      this.logger.error('Reading the response body failed', { operation });
      throw new TransportError(operation, err);
    }
  }

  private async _readBytes(operation: string, response: Response): Promise<Buffer> {
    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (err) {
      this.logger.error('Reading the response body failed', { operation });
      throw new TransportError(operation, err);
    }
  }

  /** Send an authenticated request and fail on anything but 200. */
  private async _call(
    operation: string,
    method: Method,
    path: string,
    fields: Fields,
    multipart?: FormData
  ): Promise<Response> {
    const token = this.session.requireToken();
    const response = await this._send(
      operation,
      method,
      path,
      { ...fields, access_token: token },
      multipart
    );

    if (response.status !== 200) {
      const responseText = await this._readText(operation, response);
      throw new RequestError(
        operation,
        response.status,
        extractErrorMessage(responseText),
        responseText
      );
    }
    return response;
  }

  private _decode<T>(operation: string, responseText: string, schema: Schema<T>): T {
    let parsed: unknown;
    try {
      parsed = JSON.parse(responseText);
    } catch (err) {
      const reason = err instanceof Error ? err.message : 'invalid JSON';
      throw new ProtocolError(operation, reason, responseText);
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new ProtocolError(operation, result.error.message, responseText);
    }
    return result.data;
  }

  private async _request<T>(
    operation: string,
    method: Method,
    path: string,
    fields: Fields,
    schema: Schema<T>,
    multipart?: FormData
  ): Promise<T> {
    const response = await this._call(operation, method, path, fields, multipart);
    return this._decode(operation, await this._readText(operation, response), schema);
  }

  // ------------------------------------------------------------------
  // Alerts and messages
  // ------------------------------------------------------------------

  async alert(taskId: string, title: string, message: string, type: AlertType): Promise<ServerMessage> {
    return this._request(
      'alert',
      'POST',
      '/app/api/alert/send',
      { taskId, title, message, type },
      serverMessageSchema
    );
  }

  async message(params: MessageParams): Promise<ServerMessage> {
    return this._request(
      'message',
      'POST',
      '/app/api/message/send',
      {
        email: joinRecipients(params.email),
        users: joinRecipients(params.users),
        subject: params.subject,
        body: params.body,
        type: params.type,
        group: params.group,
      },
      serverMessageSchema
    );
  }

  // ------------------------------------------------------------------
  // Tasks
  // ------------------------------------------------------------------

  async createTask(
    activityLabel: string,
    parameters: Record<string, unknown>,
    test: boolean = false
  ): Promise<AutomationTask> {
    const body = await this._request(
      'task create',
      'POST',
      '/app/api/task/create',
      {
        activityLabel,
        jsonParams: encodeTaskParameters(parameters),
        taskForTest: String(test),
      },
      createTaskResponseSchema
    );
    return body.payload;
  }

  async finishTask(
    taskId: string,
    status: AutomationTaskFinishStatus,
    message: string = ''
  ): Promise<ServerMessage> {
    return this._request(
      'task finish',
      'POST',
      '/app/api/task/finish',
      {
        taskId,
        finishStatus: status,
        finishMessage: message,
        processedItems: PROCESSED_ITEMS,
      },
      serverMessageSchema
    );
  }

  async restartTask(taskId: string): Promise<ServerMessage> {
    return this._request('task restart', 'POST', '/app/api/task/restart', { id: taskId }, serverMessageSchema);
  }

  async getTask(taskId: string): Promise<AutomationTask> {
    return this._request('task get', 'GET', '/app/api/task/get', { id: taskId }, automationTaskSchema);
  }

  // ------------------------------------------------------------------
  // Logs
  // ------------------------------------------------------------------

  async newLog(activityLabel: string, columns: Column[]): Promise<ServerMessage> {
    return this._request(
      'new log',
      'POST',
      '/app/api/log/create',
      { activityLabel, columns: encodeColumns(columns) },
      serverMessageSchema
    );
  }

  async newLogEntry(activityLabel: string, values: Record<string, unknown>): Promise<ServerMessage> {
    return this._request(
      'new log entry',
      'POST',
      '/app/api/newLogEntry',
      { logName: activityLabel, columns: JSON.stringify(values) },
      serverMessageSchema
    );
  }

  /**
   * Fetch log rows. `date` is DD/MM/YYYY and selects rows from that day on;
   * leave it empty for the whole log.
   */
  async getLog(activityLabel: string, date: string = ''): Promise<LogEntry[]> {
    const body = await this._request(
      'log read',
      'GET',
      '/app/api/log/read',
      { activityLabel, date },
      logReadResponseSchema
    );
    return parseLogEntries(body.message, 'log read');
  }

  async deleteLog(activityLabel: string): Promise<ServerMessage> {
    return this._request('log delete', 'POST', '/app/api/log/delete', { activityLabel }, serverMessageSchema);
  }

  // ------------------------------------------------------------------
  // Artifacts
  // ------------------------------------------------------------------

  /** Upload a file path or in-memory bytes as an artifact of a task. */
  async postArtifact(taskId: number | string, name: string, source: ArtifactSource): Promise<ServerMessage> {
    this.session.requireToken();
    const content = await readArtifactContent(source);

    const form = new FormData();
    form.append('body', new Blob([content], { type: 'application/octet-stream' }), name);

    return this._request(
      'artifact posting',
      'POST',
      '/app/api/newArtifact',
      { taskId: String(taskId), name },
      serverMessageSchema,
      form
    );
  }

  async getArtifact(artifactId: number | string): Promise<Artifact> {
    const response = await this._call('artifact get', 'GET', '/app/api/artifact/get', {
      id: String(artifactId),
    });

    const disposition = response.headers.get('content-disposition');
    if (!disposition) {
      await response.body?.cancel();
      throw new ProtocolError('artifact get', 'missing Content-Disposition header');
    }

    const content = await this._readBytes('artifact get', response);
    const name = parseArtifactFilename(disposition);
    if (!disposition.includes('=')) {
      this.logger.warn('Content-Disposition carries no filename field', { operation: 'artifact get' });
    }
    return { name, content };
  }
}
