/**
 * Microsoft To Do records as returned by the Microsoft Graph API.
 * Only the fields the export reads are modelled; the rest are stripped on parse.
 */

import { z } from 'zod';

const DateTimeTimeZoneSchema = z.object({
  dateTime: z.string(),
  timeZone: z.string().optional(),
});

const ItemBodySchema = z.object({
  content: z.string(),
  contentType: z.enum(['text', 'html']),
});

/**
 * Microsoft To Do list
 */
export const TodoTaskListSchema = z.object({
  id: z.string(),
  displayName: z.string(),
  isOwner: z.boolean().optional(),
  isShared: z.boolean().optional(),
  wellknownListName: z.string().optional(),
});

/**
 * Microsoft To Do task. The parent list is implied by the request path.
 */
export const TodoTaskSchema = z.object({
  id: z.string(),
  title: z.string(),
  // notStarted | inProgress | completed | waitingOnOthers | deferred
  status: z.string(),
  importance: z.string().optional(),
  body: ItemBodySchema.nullish(),
  dueDateTime: DateTimeTimeZoneSchema.nullish(),
  reminderDateTime: DateTimeTimeZoneSchema.nullish(),
  createdDateTime: z.string().optional(),
  lastModifiedDateTime: z.string().optional(),
});

export const TaskAttachmentSchema = z.object({
  id: z.string(),
  name: z.string(),
  size: z.number(),
  contentType: z.string().optional(),
  lastModifiedDateTime: z.string().optional(),
  '@odata.type': z.string(),
});

export type DateTimeTimeZone = z.infer<typeof DateTimeTimeZoneSchema>;
export type ItemBody = z.infer<typeof ItemBodySchema>;
export type TodoTaskList = z.infer<typeof TodoTaskListSchema>;
export type TodoTask = z.infer<typeof TodoTaskSchema>;
export type TaskAttachment = z.infer<typeof TaskAttachmentSchema>;

/**
 * Collection envelope used by every Graph list endpoint
 */
export const GraphCollectionSchema = z.object({
  value: z.array(z.unknown()),
  '@odata.nextLink': z.string().optional(),
  '@odata.deltaLink': z.string().optional(),
});

export const FILE_ATTACHMENT_TYPE = '#microsoft.graph.taskFileAttachment';

export function isFileAttachment(attachment: TaskAttachment): boolean {
  return attachment['@odata.type'] === FILE_ATTACHMENT_TYPE;
}

export function isCompleted(task: TodoTask): boolean {
  return task.status === 'completed';
}
