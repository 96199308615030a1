/**
 * Portal SDK - TypeScript Interfaces
 *
 * Core data types for the automation portal API.
 */

import type { Logger } from './logger.js';

export const AlertType = {
  INFO: 'INFO',
  WARN: 'WARN',
  ERROR: 'ERROR',
} as const;

export const MessageType = {
  TEXT: 'TEXT',
  HTML: 'HTML',
} as const;

export const AutomationTaskFinishStatus = {
  SUCCESS: 'SUCCESS',
  PARTIALLY_COMPLETED: 'PARTIALLY_COMPLETED',
  FAILED: 'FAILED',
} as const;

// Known values; parameters also accept any other string.
export type AlertType = (typeof AlertType)[keyof typeof AlertType] | (string & {});
export type MessageType = (typeof MessageType)[keyof typeof MessageType] | (string & {});
export type AutomationTaskFinishStatus =
  | (typeof AutomationTaskFinishStatus)[keyof typeof AutomationTaskFinishStatus]
  | (string & {});

export interface ServerMessage {
  message: string;
  result?: unknown;
  type?: string | number;
}

export interface AutomationTask {
  id: number;
  activityLabel?: string;
  state?: string;
  parameters: Record<string, unknown>;
  activityId?: number | null;
  userEmail?: string | null;
  agentId?: number | null;
  userCreationName?: string | null;
  organizationCreationName?: string | null;
  dateCreation?: string | null;
  dateLastModified?: string | null;
  finishStatus?: string | null;
  finishMessage?: string | null;
  test?: boolean;
  [key: string]: unknown;
}

export interface Column {
  name: string;
  label: string;
}

export type LogEntry = Record<string, unknown>;

export interface Artifact {
  name: string;
  content: Buffer;
}

export interface MessageParams {
  email: string[];
  users: string[];
  subject: string;
  body: string;
  type: MessageType;
  group: string;
}

export interface ClientOptions {
  server?: string;
  login?: string;
  key?: string;
  timeout?: number;
  logger?: Logger;
}
