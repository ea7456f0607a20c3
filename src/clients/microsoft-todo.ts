/**
 * Microsoft To Do API Client
 * Read-only wrapper over the Microsoft Graph todo endpoints.
 *
 * Pagination is not followed: only the first page of each collection is read.
 */

import { z } from 'zod';
import { GraphApiError } from '../core/errors.js';
import {
  GraphCollectionSchema,
  TaskAttachmentSchema,
  TodoTaskListSchema,
  TodoTaskSchema,
} from '../core/types.js';
import type { TaskAttachment, TodoTask, TodoTaskList } from '../core/types.js';
import type { Logger } from '../utils/logger.js';

export type FetchLike = typeof fetch;

export interface MicrosoftTodoClientOptions {
  /** Base resource path for task lists, ending with a slash */
  baseUrl: string;
  accessToken: string;
  /** Throw on non-success responses instead of treating them as empty */
  failOnError: boolean;
  fetcher?: FetchLike;
}

const PREFER_HTML_BODY = 'outlook.body-content-type="html"';

export class MicrosoftTodoClient {
  private baseUrl: string;
  private accessToken: string;
  private failOnError: boolean;
  private fetcher: FetchLike;
  private logger: Logger;

  constructor(options: MicrosoftTodoClientOptions, logger: Logger) {
    this.baseUrl = options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`;
    this.accessToken = options.accessToken;
    this.failOnError = options.failOnError;
    this.fetcher = options.fetcher ?? fetch;
    this.logger = logger;
  }

  private async send(endpoint: string): Promise<{ url: string; response: Response }> {
    const url = `${this.baseUrl}${endpoint}`;
    const response = await this.fetcher(url, {
      method: 'GET',
      headers: {
        Authorization: `Bearer ${this.accessToken}`,
        Prefer: PREFER_HTML_BODY,
      },
    });
    return { url, response };
  }

  /**
   * Read a collection endpoint. Failures yield an empty array unless
   * failOnError is set.
   */
  private async getCollection<T>(
    endpoint: string,
    itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T[]> {
    const { url, response } = await this.send(endpoint);

    if (!response.ok) {
      const errorText = await response.text();
      if (this.failOnError) {
        throw new GraphApiError(
          `Microsoft Graph API error: ${response.status} ${response.statusText} - ${errorText}`,
          response.status,
          url,
          errorText
        );
      }
      this.logger.warn({ status: response.status, url }, 'Graph request failed, treating as empty');
      return [];
    }

    const body: unknown = await response.json();
    const envelope = GraphCollectionSchema.safeParse(body);
    const parsed = envelope.success
      ? z.array(itemSchema).safeParse(envelope.data.value)
      : envelope;
    if (!parsed.success) {
      if (this.failOnError) {
        throw new GraphApiError(
          `Unexpected Microsoft Graph response: ${parsed.error.message}`,
          response.status,
          url
        );
      }
      this.logger.warn({ url, issues: parsed.error.issues.length }, 'Unexpected Graph response, treating as empty');
      return [];
    }

    return parsed.data;
  }

  /**
   * Get all task lists. Uses the delta endpoint without keeping its cursor,
   * so every call is a full listing.
   */
  async getLists(): Promise<TodoTaskList[]> {
    const lists = await this.getCollection('delta', TodoTaskListSchema);
    this.logger.debug(`Found ${lists.length} Microsoft To Do lists`);
    return lists;
  }

  async getTasks(listId: string): Promise<TodoTask[]> {
    const tasks = await this.getCollection(`${listId}/tasks`, TodoTaskSchema);
    this.logger.debug(`Found ${tasks.length} tasks in list ${listId}`);
    return tasks;
  }

  async getAttachments(listId: string, taskId: string): Promise<TaskAttachment[]> {
    return this.getCollection(`${listId}/tasks/${taskId}/attachments`, TaskAttachmentSchema);
  }

  /**
   * Download the raw bytes of a file attachment.
   * Returns null on a non-success status.
   */
  async getAttachmentContent(
    listId: string,
    taskId: string,
    attachmentId: string
  ): Promise<Buffer | null> {
    const { url, response } = await this.send(
      `${listId}/tasks/${taskId}/attachments/${attachmentId}/$value`
    );

    if (response.status !== 200) {
      this.logger.debug({ status: response.status, url }, 'Attachment download failed, skipping');
      return null;
    }

    return Buffer.from(await response.arrayBuffer());
  }
}
