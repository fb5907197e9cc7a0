import { z } from 'zod';
import { nonEmptyStringSchema, timestampMsSchema } from '@tasklane/validation';

/**
 * @fileoverview ClickUp-specific type definitions and Zod schemas.
 * Maps to ClickUp's REST API v2 data structures.
 *
 * Response schemas pass unknown fields through, so values survive a
 * fetch-modify-update cycle even where they are not modelled here.
 * @packageDocumentation
 */

/** Open record for shapes that vary between workspaces */
const OpenRecordSchema = z.record(z.unknown());

// ============================================================================
// Shared sub-shapes
// ============================================================================

/**
 * ClickUp user schema.
 */
export const ClickUpUserSchema = z
  .object({
    id: z.number(),
    username: z.string().nullish(),
    color: z.string().nullish(),
    email: z.string().nullish(),
    profilePicture: z.string().nullish(),
    initials: z.string().nullish(),
  })
  .passthrough();
export type ClickUpUser = z.infer<typeof ClickUpUserSchema>;

/**
 * Status attached to a task.
 */
export const ClickUpTaskStatusSchema = z
  .object({
    id: z.string().optional(),
    status: z.string(),
    color: z.string().optional(),
    type: z.string().optional(),
    orderindex: z.union([z.number(), z.string()]).optional(),
  })
  .passthrough();
export type ClickUpTaskStatus = z.infer<typeof ClickUpTaskStatusSchema>;

/**
 * Public sharing settings of a task.
 */
export const ClickUpTaskSharingSchema = z
  .object({
    public: z.boolean(),
    public_share_expires_on: z.string().nullish(),
    public_fields: z.array(z.string()).optional(),
    token: z.string().nullish(),
    seo_optimized: z.boolean().optional(),
  })
  .passthrough();
export type ClickUpTaskSharing = z.infer<typeof ClickUpTaskSharingSchema>;

/**
 * Folder or space a list lives in.
 */
export const ClickUpListLocationSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    hidden: z.boolean().optional(),
    access: z.boolean().optional(),
  })
  .passthrough();
export type ClickUpListLocation = z.infer<typeof ClickUpListLocationSchema>;

/**
 * List, project, folder or space a task lives in.
 */
export const ClickUpTaskLocationSchema = ClickUpListLocationSchema;
export type ClickUpTaskLocation = ClickUpListLocation;

// ============================================================================
// Workspaces
// ============================================================================

/**
 * Workspace as listed by `GET /team`.
 */
export const ClickUpWorkspaceSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    color: z.string().nullish(),
    avatar: z.string().nullish(),
    members: z.array(OpenRecordSchema).nullish(),
  })
  .passthrough();
export type ClickUpWorkspace = z.infer<typeof ClickUpWorkspaceSchema>;

/**
 * ClickUp team (workspace) schema, as returned by `GET /team/{id}`.
 */
export const ClickUpTeamSchema = ClickUpWorkspaceSchema.extend({
  roles: z.array(OpenRecordSchema).nullish(),
}).passthrough();
export type ClickUpTeam = z.infer<typeof ClickUpTeamSchema>;

export const ClickUpWorkspaceResponseSchema = z.object({ team: ClickUpTeamSchema }).passthrough();
export type ClickUpWorkspaceResponse = z.infer<typeof ClickUpWorkspaceResponseSchema>;

// ============================================================================
// Spaces
// ============================================================================

/**
 * ClickUp space schema.
 */
export const ClickUpSpaceSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    private: z.boolean().nullish(),
    statuses: z.array(OpenRecordSchema).nullish(),
    multiple_assignees: z.boolean().nullish(),
    features: OpenRecordSchema.nullish(),
    archived: z.boolean().nullish(),
  })
  .passthrough();
export type ClickUpSpace = z.infer<typeof ClickUpSpaceSchema>;

export const CreateSpaceRequestSchema = z.object({
  name: nonEmptyStringSchema,
  multiple_assignees: z.boolean().optional(),
});
export type CreateSpaceRequest = z.infer<typeof CreateSpaceRequestSchema>;

export const UpdateSpaceRequestSchema = z.object({
  name: nonEmptyStringSchema.optional(),
  multiple_assignees: z.boolean().optional(),
});
export type UpdateSpaceRequest = z.infer<typeof UpdateSpaceRequestSchema>;

// ============================================================================
// Folders
// ============================================================================

/**
 * ClickUp folder schema.
 */
export const ClickUpFolderSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    orderindex: z.number().nullish(),
    override_statuses: z.boolean().nullish(),
    hidden: z.boolean().nullish(),
    space: OpenRecordSchema.nullish(),
    task_count: z.string().nullish(),
    archived: z.boolean().nullish(),
    statuses: z.array(OpenRecordSchema).nullish(),
    lists: z.array(OpenRecordSchema).nullish(),
  })
  .passthrough();
export type ClickUpFolder = z.infer<typeof ClickUpFolderSchema>;

export const CreateFolderRequestSchema = z.object({
  name: nonEmptyStringSchema,
  hidden: z.boolean().optional(),
});
export type CreateFolderRequest = z.infer<typeof CreateFolderRequestSchema>;

export const UpdateFolderRequestSchema = z.object({
  name: nonEmptyStringSchema.optional(),
  hidden: z.boolean().optional(),
});
export type UpdateFolderRequest = z.infer<typeof UpdateFolderRequestSchema>;

// ============================================================================
// Lists
// ============================================================================

/** Priority level, 1 (urgent) to 4 (low) */
export const PriorityLevelSchema = z.number().int().min(1).max(4);

/**
 * ClickUp list schema.
 */
export const ClickUpListSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    orderindex: z.number().nullish(),
    content: z.string().nullish(),
    status: OpenRecordSchema.nullish(),
    priority: OpenRecordSchema.nullish(),
    assignee: OpenRecordSchema.nullish(),
    task_count: z.number().nullish(),
    due_date: z.string().nullish(),
    start_date: z.string().nullish(),
    folder: ClickUpListLocationSchema.nullish(),
    space: ClickUpListLocationSchema.nullish(),
    archived: z.boolean().nullish(),
    override_statuses: z.union([z.boolean(), OpenRecordSchema]).nullish(),
    permission_level: z.string().nullish(),
  })
  .passthrough();
export type ClickUpList = z.infer<typeof ClickUpListSchema>;

export const CreateListRequestSchema = z.object({
  name: nonEmptyStringSchema,
  content: z.string().optional(),
  due_date: timestampMsSchema.optional(),
  priority: PriorityLevelSchema.optional(),
  assignee: z.number().int().optional(),
  status: z.string().optional(),
});
export type CreateListRequest = z.infer<typeof CreateListRequestSchema>;

export const UpdateListRequestSchema = z.object({
  name: nonEmptyStringSchema.optional(),
  content: z.string().optional(),
  due_date: timestampMsSchema.optional(),
  due_date_time: z.boolean().optional(),
  priority: PriorityLevelSchema.optional(),
  assignee: z.number().int().optional(),
  unset_status: z.boolean().optional(),
  status: z.string().optional(),
});
export type UpdateListRequest = z.infer<typeof UpdateListRequestSchema>;

export const GetListsResponseSchema = z.object({ lists: z.array(ClickUpListSchema) }).passthrough();
export type GetListsResponse = z.infer<typeof GetListsResponseSchema>;

// ============================================================================
// Tasks
// ============================================================================

/**
 * ClickUp task schema.
 */
export const ClickUpTaskSchema = z
  .object({
    id: z.string(),
    custom_id: z.string().nullish(),
    custom_item_id: z.number().nullish(),
    name: z.string(),
    text_content: z.string().nullish(),
    description: z.string().nullish(),
    status: ClickUpTaskStatusSchema.nullish(),
    orderindex: z.string().nullish(),
    date_created: z.string().nullish(),
    date_updated: z.string().nullish(),
    date_closed: z.string().nullish(),
    date_done: z.string().nullish(),
    archived: z.boolean().nullish(),
    creator: ClickUpUserSchema.nullish(),
    assignees: z.array(ClickUpUserSchema).nullish(),
    group_assignees: z.array(OpenRecordSchema).nullish(),
    watchers: z.array(ClickUpUserSchema).nullish(),
    checklists: z.array(OpenRecordSchema).nullish(),
    tags: z.array(z.union([z.string(), OpenRecordSchema])).nullish(),
    parent: z.string().nullish(),
    top_level_parent: z.string().nullish(),
    priority: OpenRecordSchema.nullish(),
    due_date: z.string().nullish(),
    start_date: z.string().nullish(),
    points: z.number().nullish(),
    time_estimate: z.number().nullish(),
    time_spent: z.number().nullish(),
    custom_fields: z.array(OpenRecordSchema).nullish(),
    dependencies: z.array(z.union([z.string(), OpenRecordSchema])).nullish(),
    linked_tasks: z.array(z.union([z.string(), OpenRecordSchema])).nullish(),
    locations: z.array(OpenRecordSchema).nullish(),
    team_id: z.string().nullish(),
    url: z.string().nullish(),
    sharing: ClickUpTaskSharingSchema.nullish(),
    permission_level: z.string().nullish(),
    list: ClickUpTaskLocationSchema.nullish(),
    project: ClickUpTaskLocationSchema.nullish(),
    folder: ClickUpTaskLocationSchema.nullish(),
    space: ClickUpTaskLocationSchema.nullish(),
    attachments: z.array(OpenRecordSchema).nullish(),
  })
  .passthrough();
export type ClickUpTask = z.infer<typeof ClickUpTaskSchema>;

export const CreateTaskRequestSchema = z.object({
  name: nonEmptyStringSchema,
  description: z.string().optional(),
  assignees: z.array(z.number().int()).optional(),
  archived: z.boolean().optional(),
  group_assignees: z.array(z.string()).optional(),
  tags: z.array(z.string()).optional(),
  status: z.string().optional(),
  priority: PriorityLevelSchema.optional(),
  due_date: timestampMsSchema.optional(),
  due_date_time: z.boolean().optional(),
  time_estimate: z.number().int().nonnegative().optional(),
  start_date: timestampMsSchema.optional(),
  start_date_time: z.boolean().optional(),
  points: z.number().optional(),
  notify_all: z.boolean().optional(),
  parent: z.string().optional(),
  markdown_content: z.string().optional(),
  links_to: z.string().optional(),
  check_required_custom_fields: z.boolean().optional(),
  custom_fields: z.array(OpenRecordSchema).optional(),
  custom_item_id: z.number().int().optional(),
});
export type CreateTaskRequest = z.infer<typeof CreateTaskRequestSchema>;

/**
 * Partial task update. `null` clears priority or due date; an omitted key
 * leaves the remote value unchanged.
 */
export const UpdateTaskRequestSchema = z.object({
  name: nonEmptyStringSchema.optional(),
  description: z.string().optional(),
  status: z.string().optional(),
  priority: PriorityLevelSchema.nullable().optional(),
  due_date: timestampMsSchema.nullable().optional(),
  time_estimate: z.number().int().nonnegative().optional(),
  assignees: z.array(z.number().int()).optional(),
  add_assignees: z.array(z.number().int()).optional(),
  remove_assignees: z.array(z.number().int()).optional(),
});
export type UpdateTaskRequest = z.infer<typeof UpdateTaskRequestSchema>;

/**
 * Task listing options. Pages are zero-based.
 */
export const GetTasksOptionsSchema = z.object({
  archived: z.boolean().default(false),
  page: z.number().int().min(0).default(0),
  subtasks: z.boolean().default(false),
});
export type GetTasksOptions = z.input<typeof GetTasksOptionsSchema>;

export const GetTasksResponseSchema = z
  .object({
    tasks: z.array(ClickUpTaskSchema),
    last_page: z.boolean().optional(),
  })
  .passthrough();
export type GetTasksResponse = z.infer<typeof GetTasksResponseSchema>;

// ============================================================================
// Comments
// ============================================================================

/**
 * ClickUp comment schema.
 */
export const ClickUpCommentSchema = z
  .object({
    id: z.string(),
    comment_text: z.string().nullish(),
    comment: z.array(OpenRecordSchema).nullish(),
    user: ClickUpUserSchema.nullish(),
    date: z.string().nullish(),
    resolved: z.boolean().nullish(),
  })
  .passthrough();
export type ClickUpComment = z.infer<typeof ClickUpCommentSchema>;

export const CreateCommentRequestSchema = z.object({
  comment_text: nonEmptyStringSchema,
  assignee: z.number().int().optional(),
  notify_all: z.boolean().optional(),
});
export type CreateCommentRequest = z.infer<typeof CreateCommentRequestSchema>;

export const CreateCommentResponseSchema = z
  .object({
    id: z.union([z.string(), z.number()]),
    hist_id: z.string().nullish(),
    date: z.union([z.number(), z.string()]).nullish(),
  })
  .passthrough();
export type CreateCommentResponse = z.infer<typeof CreateCommentResponseSchema>;

// ============================================================================
// Dependencies
// ============================================================================

/**
 * Dependency links to add to a task. At least one list must name a task.
 */
export const SetTaskDependenciesRequestSchema = z
  .object({
    depends_on: z.array(z.string()).optional(),
    dependency_of: z.array(z.string()).optional(),
  })
  .refine(
    (request) => (request.depends_on?.length ?? 0) > 0 || (request.dependency_of?.length ?? 0) > 0,
    { message: 'Provide at least one task in depends_on or dependency_of' }
  );
export type SetTaskDependenciesRequest = z.infer<typeof SetTaskDependenciesRequestSchema>;

/** Dependency responses carry no documented fields; an empty body reads as `{}` */
export const SetTaskDependenciesResponseSchema = OpenRecordSchema.nullable().transform(
  (value): Record<string, unknown> => value ?? {}
);
