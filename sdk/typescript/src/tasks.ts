/**
 * Portal SDK - Task Management
 *
 * Task methods on PortalClient:
 *   - createTask(activityLabel, parameters, test?): Promise<AutomationTask>
 *   - finishTask(taskId, status, message?): Promise<ServerMessage>
 *   - restartTask(taskId): Promise<ServerMessage>
 *   - getTask(taskId): Promise<AutomationTask>
 */

export type { AutomationTask, AutomationTaskFinishStatus } from './types.js';

// The portal expects a processed-items count on finish; it is always sent as 1.
export const PROCESSED_ITEMS = '1';

export function encodeTaskParameters(parameters: Record<string, unknown>): string {
  return JSON.stringify(parameters);
}
