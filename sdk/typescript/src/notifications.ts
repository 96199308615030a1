/**
 * Portal SDK - Alerts and Messages
 *
 * Notification methods on PortalClient:
 *   - alert(taskId, title, message, type): Promise<ServerMessage>
 *   - message(params): Promise<ServerMessage>
 */

export type { AlertType, MessageType, MessageParams, ServerMessage } from './types.js';

export function joinRecipients(recipients: string[]): string {
  return recipients.join(',');
}
