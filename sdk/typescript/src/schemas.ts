/**
 * Portal SDK - Response Schemas
 *
 * Shapes of the 200 bodies the portal returns. Unknown fields pass through.
 */

import { z } from 'zod';

export const serverMessageSchema = z
  .object({
    message: z.string(),
    result: z.unknown().optional(),
    type: z.union([z.string(), z.number()]).optional(),
  })
  .passthrough();

export const automationTaskSchema = z
  .object({
    id: z.number(),
    activityLabel: z.string().optional(),
    state: z.string().optional(),
    parameters: z
      .record(z.unknown())
      .nullish()
      .transform((value) => value ?? {}),
    activityId: z.number().nullish(),
    userEmail: z.string().nullish(),
    agentId: z.number().nullish(),
    userCreationName: z.string().nullish(),
    organizationCreationName: z.string().nullish(),
    dateCreation: z.string().nullish(),
    dateLastModified: z.string().nullish(),
    finishStatus: z.string().nullish(),
    finishMessage: z.string().nullish(),
    test: z.boolean().optional(),
  })
  .passthrough();

export const createTaskResponseSchema = z.object({
  payload: automationTaskSchema,
});

export const loginResponseSchema = z.object({
  access_token: z.string().min(1),
});

export const logReadResponseSchema = z.object({
  message: z.string(),
});

export const logRowsSchema = z.array(
  z
    .object({
      columns: z.record(z.unknown()),
    })
    .passthrough()
);
