/**
 * @fileoverview ClickUp integration exports.
 * @packageDocumentation
 * @module @tasklane/integrations/clickup
 */

export { ClickUpClient, CLICKUP_API_BASE } from './client.js';
export type { ClickUpClientConfig } from './client.js';

export {
  ClickUpUserSchema,
  ClickUpTaskStatusSchema,
  ClickUpTaskSharingSchema,
  ClickUpListLocationSchema,
  ClickUpTaskLocationSchema,
  ClickUpWorkspaceSchema,
  ClickUpTeamSchema,
  ClickUpWorkspaceResponseSchema,
  ClickUpSpaceSchema,
  CreateSpaceRequestSchema,
  UpdateSpaceRequestSchema,
  ClickUpFolderSchema,
  CreateFolderRequestSchema,
  UpdateFolderRequestSchema,
  PriorityLevelSchema,
  ClickUpListSchema,
  CreateListRequestSchema,
  UpdateListRequestSchema,
  GetListsResponseSchema,
  ClickUpTaskSchema,
  CreateTaskRequestSchema,
  UpdateTaskRequestSchema,
  GetTasksOptionsSchema,
  GetTasksResponseSchema,
  ClickUpCommentSchema,
  CreateCommentRequestSchema,
  CreateCommentResponseSchema,
  SetTaskDependenciesRequestSchema,
  SetTaskDependenciesResponseSchema,
} from './types.js';

export type {
  ClickUpUser,
  ClickUpTaskStatus,
  ClickUpTaskSharing,
  ClickUpListLocation,
  ClickUpTaskLocation,
  ClickUpWorkspace,
  ClickUpTeam,
  ClickUpWorkspaceResponse,
  ClickUpSpace,
  CreateSpaceRequest,
  UpdateSpaceRequest,
  ClickUpFolder,
  CreateFolderRequest,
  UpdateFolderRequest,
  ClickUpList,
  CreateListRequest,
  UpdateListRequest,
  GetListsResponse,
  ClickUpTask,
  CreateTaskRequest,
  UpdateTaskRequest,
  GetTasksOptions,
  GetTasksResponse,
  ClickUpComment,
  CreateCommentRequest,
  CreateCommentResponse,
  SetTaskDependenciesRequest,
} from './types.js';
