/**
 * @fileoverview Read-only HTTP routes over the ClickUp client
 * @module @tasklane/platform/routes/api
 */

import { Hono, type Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { z } from 'zod';
import { NotFoundError, fromStatusCode } from '@tasklane/errors';
import type { ApiResult, ClickUpClient } from '@tasklane/integrations';
import type { RequestLoggerEnv } from '@tasklane/logger';
import { pageNumberSchema, queryBooleanSchema, resourceIdSchema, validate } from '@tasklane/validation';

/**
 * Client operations the routes forward to
 */
export type ClickUpReader = Pick<
  ClickUpClient,
  | 'getWorkspaces'
  | 'getSpaces'
  | 'getFolders'
  | 'getLists'
  | 'getListsInSpace'
  | 'getTasks'
  | 'getTask'
  | 'getTaskComments'
>;

const TaskListingQuerySchema = z.object({
  archived: queryBooleanSchema.optional(),
  page: pageNumberSchema.optional(),
  subtasks: queryBooleanSchema.optional(),
});

function isStatusCode(status: number): status is ContentfulStatusCode {
  return Number.isInteger(status) && status >= 100 && status <= 599;
}

function idParam(c: Context<RequestLoggerEnv>, name: string): string {
  return validate(resourceIdSchema, c.req.param(name), `Invalid ${name}`);
}

/**
 * Renders a client result. Failures become errors carrying the remote status;
 * `null` data for a named resource renders 404.
 */
function render(c: Context<RequestLoggerEnv>, result: ApiResult<unknown>, resource?: string): Response {
  if (!result.ok) {
    const details: Record<string, unknown> = { upstream: 'clickup' };
    if (result.code !== undefined) details['code'] = result.code;
    throw fromStatusCode(result.status, result.error, details);
  }
  if (result.data === null && resource !== undefined) {
    throw new NotFoundError(resource);
  }

  return c.body(JSON.stringify(result.data), isStatusCode(result.status) ? result.status : 200, {
    'Content-Type': 'application/json',
  });
}

/**
 * Create the `/api` router.
 *
 * @example
 * ```typescript
 * app.route('/api', createApiRoutes(ClickUpClient.fromEnv()));
 * ```
 */
export function createApiRoutes(client: ClickUpReader): Hono<RequestLoggerEnv> {
  const api = new Hono<RequestLoggerEnv>();

  api.get('/workspaces', async (c) => render(c, await client.getWorkspaces()));

  api.get('/workspaces/:workspaceId/spaces', async (c) =>
    render(c, await client.getSpaces(idParam(c, 'workspaceId')))
  );

  api.get('/spaces/:spaceId/folders', async (c) => render(c, await client.getFolders(idParam(c, 'spaceId'))));

  api.get('/spaces/:spaceId/lists', async (c) => render(c, await client.getListsInSpace(idParam(c, 'spaceId'))));

  api.get('/folders/:folderId/lists', async (c) => render(c, await client.getLists(idParam(c, 'folderId'))));

  api.get('/lists/:listId/tasks', async (c) => {
    const listId = idParam(c, 'listId');
    const query = validate(TaskListingQuerySchema, c.req.query(), 'Invalid task listing query');
    return render(c, await client.getTasks(listId, query));
  });

  api.get('/tasks/:taskId', async (c) => render(c, await client.getTask(idParam(c, 'taskId')), 'Task'));

  api.get('/tasks/:taskId/comments', async (c) =>
    render(c, await client.getTaskComments(idParam(c, 'taskId')))
  );

  return api;
}
