/**
 * Portal SDK
 *
 * Typed client for the automation portal: alerts, messages, tasks, logs and
 * artifacts.
 */

export { PortalClient, DEFAULT_TIMEOUT } from './client.js';
export { Session, normalizeServer, type Credentials } from './session.js';
export { createPortalClient, loadConfig, ENV_KEYS, type CreateClientOptions } from './config.js';
export { consoleLogger, silentLogger, type Logger, type LogContext } from './logger.js';
export {
  PortalError,
  ConfigurationError,
  PreconditionError,
  AuthenticationError,
  RequestError,
  ProtocolError,
  TransportError,
  extractErrorMessage,
} from './errors.js';
export { PROCESSED_ITEMS, encodeTaskParameters } from './tasks.js';
export { encodeColumns, parseLogEntries } from './logs.js';
export { parseArtifactFilename, readArtifactContent, type ArtifactSource } from './artifacts.js';
export { joinRecipients } from './notifications.js';
export { AlertType, MessageType, AutomationTaskFinishStatus } from './types.js';
export type {
  ServerMessage,
  AutomationTask,
  Column,
  LogEntry,
  Artifact,
  MessageParams,
  ClientOptions,
} from './types.js';
