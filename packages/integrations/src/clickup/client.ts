import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import { createLogger } from '@tasklane/logger';
import { formatZodErrorsFlat, omitUndefined, validate } from '@tasklane/validation';
import {
  type ApiResult,
  type HttpMethod,
  type IntegrationConfig,
  type QueryParams,
  ConfigurationError,
  TRANSPORT_FAILURE_STATUS,
  createHttpClient,
  decodeBody,
  describeTransportError,
  extractRemoteError,
  failure,
  isRecord,
  pathSegment,
  success,
} from '../common/index.js';
import {
  ClickUpCommentSchema,
  ClickUpFolderSchema,
  ClickUpListSchema,
  ClickUpSpaceSchema,
  ClickUpTaskSchema,
  ClickUpWorkspaceResponseSchema,
  ClickUpWorkspaceSchema,
  CreateCommentRequestSchema,
  CreateCommentResponseSchema,
  CreateFolderRequestSchema,
  CreateListRequestSchema,
  CreateSpaceRequestSchema,
  CreateTaskRequestSchema,
  GetListsResponseSchema,
  GetTasksOptionsSchema,
  GetTasksResponseSchema,
  SetTaskDependenciesRequestSchema,
  SetTaskDependenciesResponseSchema,
  UpdateFolderRequestSchema,
  UpdateListRequestSchema,
  UpdateSpaceRequestSchema,
  UpdateTaskRequestSchema,
  type ClickUpComment,
  type ClickUpFolder,
  type ClickUpList,
  type ClickUpSpace,
  type ClickUpTask,
  type ClickUpWorkspace,
  type ClickUpWorkspaceResponse,
  type CreateCommentRequest,
  type CreateCommentResponse,
  type CreateFolderRequest,
  type CreateListRequest,
  type CreateSpaceRequest,
  type CreateTaskRequest,
  type GetListsResponse,
  type GetTasksOptions,
  type GetTasksResponse,
  type SetTaskDependenciesRequest,
  type UpdateFolderRequest,
  type UpdateListRequest,
  type UpdateSpaceRequest,
  type UpdateTaskRequest,
} from './types.js';

/**
 * @fileoverview ClickUp REST API client implementation.
 * Covers workspaces, spaces, folders, lists, tasks, comments and task
 * dependencies. Every call resolves to an {@link ApiResult}.
 * @packageDocumentation
 */

const logger = createLogger('clickup-client');

/** ClickUp API base URL */
export const CLICKUP_API_BASE = 'https://api.clickup.com/api/v2';

/**
 * ClickUp client configuration options.
 */
export interface ClickUpClientConfig extends IntegrationConfig {
  /** Personal API token or OAuth access token */
  apiKey: string;
}

/**
 * One remote call: where it goes and how its payload is read.
 */
interface Operation<T> {
  method: HttpMethod;
  endpoint: string;
  /** Validates the decoded payload */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  body?: Record<string, unknown>;
  params?: QueryParams;
  /** Key of the payload nested in the response object */
  dataKey?: string;
  /** Treat an empty body or `{}` as `null` */
  allowEmpty?: boolean;
}

const NoContentSchema = z.null();

/**
 * ClickUp REST API client.
 *
 * @example
 * ```typescript
 * const client = new ClickUpClient({ apiKey: process.env.CLICKUP_API_KEY ?? '' });
 *
 * const spaces = await client.getSpaces('9012004');
 * if (spaces.ok) {
 *   for (const space of spaces.data) console.log(space.name);
 * }
 *
 * const task = await client.createTask('901200451', { name: 'Write release notes', priority: 2 });
 * ```
 */
export class ClickUpClient {
  private readonly apiKey: string;
  private readonly http: AxiosInstance;

  /**
   * Creates a new ClickUp client.
   * @throws ConfigurationError when the token is empty
   */
  constructor(config: ClickUpClientConfig) {
    if (config.apiKey.trim() === '') {
      throw new ConfigurationError('clickup', 'ClickUp API key is required');
    }
    this.apiKey = config.apiKey;
    this.http =
      config.httpClient ??
      createHttpClient('clickup', {
        baseUrl: config.baseUrl ?? CLICKUP_API_BASE,
        timeout: config.timeout,
        debug: config.debug,
      });
  }

  /**
   * Creates a client from `CLICKUP_API_KEY` and the optional `CLICKUP_BASE_URL`.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): ClickUpClient {
    const apiKey = env['CLICKUP_API_KEY'];
    if (!apiKey?.trim()) {
      throw new ConfigurationError('clickup', 'CLICKUP_API_KEY is not set');
    }
    return new ClickUpClient({ apiKey, baseUrl: env['CLICKUP_BASE_URL'] || undefined });
  }

  // ==========================================================================
  // Workspaces
  // ==========================================================================

  /**
   * Lists the workspaces the token can access.
   */
  async getWorkspaces(): Promise<ApiResult<ClickUpWorkspace[]>> {
    return this.request({
      method: 'GET',
      endpoint: 'team',
      dataKey: 'teams',
      schema: z.array(ClickUpWorkspaceSchema),
    });
  }

  async getWorkspace(workspaceId: string): Promise<ApiResult<ClickUpWorkspaceResponse>> {
    return this.request({
      method: 'GET',
      endpoint: `team/${pathSegment(workspaceId)}`,
      schema: ClickUpWorkspaceResponseSchema,
    });
  }

  // ==========================================================================
  // Spaces
  // ==========================================================================

  async getSpaces(workspaceId: string): Promise<ApiResult<ClickUpSpace[]>> {
    return this.request({
      method: 'GET',
      endpoint: `team/${pathSegment(workspaceId)}/space`,
      dataKey: 'spaces',
      schema: z.array(ClickUpSpaceSchema),
    });
  }

  /**
   * Fetches one space. Resolves to `null` data when ClickUp answers with an
   * empty body.
   */
  async getSpace(spaceId: string): Promise<ApiResult<ClickUpSpace | null>> {
    return this.request({
      method: 'GET',
      endpoint: `space/${pathSegment(spaceId)}`,
      allowEmpty: true,
      schema: ClickUpSpaceSchema.nullable(),
    });
  }

  async createSpace(workspaceId: string, request: CreateSpaceRequest): Promise<ApiResult<ClickUpSpace>> {
    const body = validate(CreateSpaceRequestSchema, request, 'Invalid space request');
    return this.request({
      method: 'POST',
      endpoint: `team/${pathSegment(workspaceId)}/space`,
      body,
      schema: ClickUpSpaceSchema,
    });
  }

  async updateSpace(spaceId: string, request: UpdateSpaceRequest): Promise<ApiResult<ClickUpSpace>> {
    const body = validate(UpdateSpaceRequestSchema, request, 'Invalid space update');
    return this.request({
      method: 'PUT',
      endpoint: `space/${pathSegment(spaceId)}`,
      body: omitUndefined(body),
      schema: ClickUpSpaceSchema,
    });
  }

  async deleteSpace(spaceId: string): Promise<ApiResult<null>> {
    return this.request({
      method: 'DELETE',
      endpoint: `space/${pathSegment(spaceId)}`,
      schema: NoContentSchema,
    });
  }

  // ==========================================================================
  // Folders
  // ==========================================================================

  async getFolders(spaceId: string): Promise<ApiResult<ClickUpFolder[]>> {
    return this.request({
      method: 'GET',
      endpoint: `space/${pathSegment(spaceId)}/folder`,
      dataKey: 'folders',
      schema: z.array(ClickUpFolderSchema),
    });
  }

  async getFolder(folderId: string): Promise<ApiResult<ClickUpFolder | null>> {
    return this.request({
      method: 'GET',
      endpoint: `folder/${pathSegment(folderId)}`,
      allowEmpty: true,
      schema: ClickUpFolderSchema.nullable(),
    });
  }

  async createFolder(spaceId: string, request: CreateFolderRequest): Promise<ApiResult<ClickUpFolder>> {
    const body = validate(CreateFolderRequestSchema, request, 'Invalid folder request');
    return this.request({
      method: 'POST',
      endpoint: `space/${pathSegment(spaceId)}/folder`,
      body,
      schema: ClickUpFolderSchema,
    });
  }

  async updateFolder(folderId: string, request: UpdateFolderRequest): Promise<ApiResult<ClickUpFolder>> {
    const body = validate(UpdateFolderRequestSchema, request, 'Invalid folder update');
    return this.request({
      method: 'PUT',
      endpoint: `folder/${pathSegment(folderId)}`,
      body: omitUndefined(body),
      schema: ClickUpFolderSchema,
    });
  }

  async deleteFolder(folderId: string): Promise<ApiResult<null>> {
    return this.request({
      method: 'DELETE',
      endpoint: `folder/${pathSegment(folderId)}`,
      schema: NoContentSchema,
    });
  }

  // ==========================================================================
  // Lists
  // ==========================================================================

  /**
   * Lists the lists inside a folder.
   */
  async getLists(folderId: string): Promise<ApiResult<GetListsResponse>> {
    return this.request({
      method: 'GET',
      endpoint: `folder/${pathSegment(folderId)}/list`,
      schema: GetListsResponseSchema,
    });
  }

  /**
   * Lists the folderless lists of a space.
   */
  async getListsInSpace(spaceId: string): Promise<ApiResult<GetListsResponse>> {
    return this.request({
      method: 'GET',
      endpoint: `space/${pathSegment(spaceId)}/list`,
      schema: GetListsResponseSchema,
    });
  }

  async getList(listId: string): Promise<ApiResult<ClickUpList | null>> {
    return this.request({
      method: 'GET',
      endpoint: `list/${pathSegment(listId)}`,
      allowEmpty: true,
      schema: ClickUpListSchema.nullable(),
    });
  }

  async createListInFolder(folderId: string, request: CreateListRequest): Promise<ApiResult<ClickUpList>> {
    const body = validate(CreateListRequestSchema, request, 'Invalid list request');
    return this.request({
      method: 'POST',
      endpoint: `folder/${pathSegment(folderId)}/list`,
      body,
      schema: ClickUpListSchema,
    });
  }

  async createListInSpace(spaceId: string, request: CreateListRequest): Promise<ApiResult<ClickUpList>> {
    const body = validate(CreateListRequestSchema, request, 'Invalid list request');
    return this.request({
      method: 'POST',
      endpoint: `space/${pathSegment(spaceId)}/list`,
      body,
      schema: ClickUpListSchema,
    });
  }

  async updateList(listId: string, request: UpdateListRequest): Promise<ApiResult<ClickUpList>> {
    const body = validate(UpdateListRequestSchema, request, 'Invalid list update');
    return this.request({
      method: 'PUT',
      endpoint: `list/${pathSegment(listId)}`,
      body: omitUndefined(body),
      schema: ClickUpListSchema,
    });
  }

  async deleteList(listId: string): Promise<ApiResult<null>> {
    return this.request({
      method: 'DELETE',
      endpoint: `list/${pathSegment(listId)}`,
      schema: NoContentSchema,
    });
  }

  // ==========================================================================
  // Tasks
  // ==========================================================================

  /**
   * Lists one page of tasks in a list.
   * @param options - Archived and subtask filters; pages are zero-based
   */
  async getTasks(listId: string, options: GetTasksOptions = {}): Promise<ApiResult<GetTasksResponse>> {
    const { archived, page, subtasks } = validate(GetTasksOptionsSchema, options, 'Invalid task listing options');
    return this.request({
      method: 'GET',
      endpoint: `list/${pathSegment(listId)}/task`,
      params: { archived: String(archived), page, subtasks: String(subtasks) },
      schema: GetTasksResponseSchema,
    });
  }

  async getTask(taskId: string): Promise<ApiResult<ClickUpTask | null>> {
    return this.request({
      method: 'GET',
      endpoint: `task/${pathSegment(taskId)}`,
      allowEmpty: true,
      schema: ClickUpTaskSchema.nullable(),
    });
  }

  async createTask(listId: string, request: CreateTaskRequest): Promise<ApiResult<ClickUpTask>> {
    const body = validate(CreateTaskRequestSchema, request, 'Invalid task request');
    return this.request({
      method: 'POST',
      endpoint: `list/${pathSegment(listId)}/task`,
      body,
      schema: ClickUpTaskSchema,
    });
  }

  /**
   * Updates the fields set on the request. `priority: null` and
   * `due_date: null` clear those values.
   */
  async updateTask(taskId: string, request: UpdateTaskRequest): Promise<ApiResult<ClickUpTask>> {
    const body = validate(UpdateTaskRequestSchema, request, 'Invalid task update');
    return this.request({
      method: 'PUT',
      endpoint: `task/${pathSegment(taskId)}`,
      body: omitUndefined(body),
      schema: ClickUpTaskSchema,
    });
  }

  async deleteTask(taskId: string): Promise<ApiResult<null>> {
    return this.request({
      method: 'DELETE',
      endpoint: `task/${pathSegment(taskId)}`,
      schema: NoContentSchema,
    });
  }

  // ==========================================================================
  // Comments
  // ==========================================================================

  /**
   * Adds a comment to a task.
   * @param comment - Comment text, or a full comment request
   */
  async addTaskComment(
    taskId: string,
    comment: string | CreateCommentRequest
  ): Promise<ApiResult<CreateCommentResponse>> {
    const request = typeof comment === 'string' ? { comment_text: comment } : comment;
    const body = validate(CreateCommentRequestSchema, request, 'Invalid comment request');
    return this.request({
      method: 'POST',
      endpoint: `task/${pathSegment(taskId)}/comment`,
      body,
      schema: CreateCommentResponseSchema,
    });
  }

  async getTaskComments(taskId: string): Promise<ApiResult<ClickUpComment[]>> {
    return this.request({
      method: 'GET',
      endpoint: `task/${pathSegment(taskId)}/comment`,
      dataKey: 'comments',
      schema: z.array(ClickUpCommentSchema),
    });
  }

  // ==========================================================================
  // Dependencies
  // ==========================================================================

  /**
   * Links a task to the tasks it waits on and the tasks waiting on it.
   * Empty lists are left out of the request.
   */
  async setTaskDependencies(
    taskId: string,
    request: SetTaskDependenciesRequest
  ): Promise<ApiResult<Record<string, unknown>>> {
    const { depends_on, dependency_of } = validate(
      SetTaskDependenciesRequestSchema,
      request,
      'Invalid dependency request'
    );
    const body: Record<string, unknown> = {};
    if (depends_on?.length) body['depends_on'] = depends_on;
    if (dependency_of?.length) body['dependency_of'] = dependency_of;

    return this.request({
      method: 'POST',
      endpoint: `task/${pathSegment(taskId)}/dependency`,
      body,
      schema: SetTaskDependenciesResponseSchema,
    });
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  /**
   * Sends one request and folds the outcome into an ApiResult.
   * Errors other than transport failures propagate.
   */
  private async request<T>(operation: Operation<T>): Promise<ApiResult<T>> {
    const { method, endpoint } = operation;
    logger.debug('ClickUp request', { method, endpoint });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>({
        method,
        url: endpoint,
        data: operation.body,
        params: operation.params,
        headers: {
          Authorization: this.apiKey,
          'Content-Type': 'application/json',
        },
      });
    } catch (error) {
      if (!axios.isAxiosError(error)) {
        throw error;
      }
      if (!error.response) {
        return this.fail(operation, describeTransportError(error), TRANSPORT_FAILURE_STATUS);
      }
      response = error.response;
    }

    const { status } = response;
    if (status < 200 || status >= 300) {
      const remote = extractRemoteError(response.data, status);
      return this.fail(operation, remote.message, status, remote.code);
    }

    if (method === 'DELETE') {
      return this.parse(operation, null, status);
    }

    const decoded = decodeBody(response.data);
    if (!decoded.ok) {
      return this.fail(operation, 'Malformed response body', status);
    }

    let payload = decoded.value;
    if (operation.allowEmpty && isRecord(payload) && Object.keys(payload).length === 0) {
      payload = null;
    }
    if (operation.dataKey !== undefined && isRecord(payload)) {
      payload = payload[operation.dataKey];
    }

    return this.parse(operation, payload, status);
  }

  private parse<T>(operation: Operation<T>, payload: unknown, status: number): ApiResult<T> {
    const parsed = operation.schema.safeParse(payload);
    if (!parsed.success) {
      const detail = formatZodErrorsFlat(parsed.error).join('; ');
      return this.fail(operation, `Unexpected response shape: ${detail}`, status);
    }
    return success(parsed.data, status);
  }

  private fail<T>(operation: Operation<T>, error: string, status: number, code?: string): ApiResult<T> {
    logger.warn('ClickUp request failed', {
      method: operation.method,
      endpoint: operation.endpoint,
      status,
      error,
      ...(code === undefined ? {} : { remoteCode: code }),
    });
    return failure(error, status, code);
  }
}
