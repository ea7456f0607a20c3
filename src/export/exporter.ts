/**
 * Export driver: one output document per non-empty task list.
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import type { MicrosoftTodoClient } from '../clients/microsoft-todo.js';
import type { ExportConfig } from '../config.js';
import { isFileAttachment } from '../core/types.js';
import type { TaskAttachment, TodoTask, TodoTaskList } from '../core/types.js';
import type { Logger } from '../utils/logger.js';
import { DocumentBuilder, formatFor } from './document.js';
import type { AttachmentEntry, DocumentFormat, TaskEntry } from './document.js';
import { attachmentFilename, exportFilename } from './filename.js';
import { createMarkdownConverter } from './markdown.js';
import type { MarkdownConverter } from './markdown.js';

export type TodoReader = Pick<
  MicrosoftTodoClient,
  'getLists' | 'getTasks' | 'getAttachments' | 'getAttachmentContent'
>;

export interface ExporterOptions {
  format: ExportConfig['format'];
  saveAttachments: boolean;
  outputDir: string;
  /** Clock used for output filenames */
  now?: () => Date;
  convert?: MarkdownConverter;
}

export interface ExportedList {
  listId: string;
  listName: string;
  path: string;
  taskCount: number;
}

export interface ExportSummary {
  exported: ExportedList[];
  skipped: string[];
  savedAttachments: string[];
}

export class TaskExporter {
  private client: TodoReader;
  private format: DocumentFormat;
  private saveAttachments: boolean;
  private outputDir: string;
  private now: () => Date;
  private logger: Logger;

  constructor(client: TodoReader, options: ExporterOptions, logger: Logger) {
    this.client = client;
    this.format = formatFor(options.format, options.convert ?? createMarkdownConverter());
    this.saveAttachments = options.saveAttachments;
    this.outputDir = options.outputDir;
    this.now = options.now ?? (() => new Date());
    this.logger = logger;
  }

  async exportAll(): Promise<ExportSummary> {
    const summary: ExportSummary = { exported: [], skipped: [], savedAttachments: [] };

    const lists = await this.client.getLists();
    this.logger.info({ listCount: lists.length, format: this.format.name }, 'Exporting task lists');

    for (const list of lists) {
      const result = await this.exportList(list, summary.savedAttachments);
      if (result) {
        summary.exported.push(result);
      } else {
        summary.skipped.push(list.displayName);
      }
    }

    return summary;
  }

  /**
   * Write one list to disk. Returns null when the list has no tasks.
   */
  async exportList(list: TodoTaskList, savedAttachments: string[] = []): Promise<ExportedList | null> {
    const tasks = await this.client.getTasks(list.id);
    if (tasks.length === 0) {
      this.logger.debug({ list: list.displayName }, 'Skipping empty list');
      return null;
    }

    const filename = exportFilename(list.displayName, this.now(), this.format.extension);
    const builder = new DocumentBuilder(this.format, list.displayName);

    for (const task of tasks) {
      builder.addTask(await this.collectTask(list, task, savedAttachments));
    }

    this.ensureOutputDir();
    const path = join(this.outputDir, filename);
    writeFileSync(path, builder.build(), 'utf-8');

    this.logger.info(`Tasks for list '${list.displayName}' have been exported to ${filename}`);

    return { listId: list.id, listName: list.displayName, path, taskCount: builder.taskCount };
  }

  private async collectTask(
    list: TodoTaskList,
    task: TodoTask,
    savedAttachments: string[]
  ): Promise<TaskEntry> {
    const attachments = await this.client.getAttachments(list.id, task.id);
    const entries: AttachmentEntry[] = [];

    for (const attachment of attachments) {
      const entry: AttachmentEntry = { name: attachment.name, size: attachment.size };
      if (this.saveAttachments && isFileAttachment(attachment)) {
        const savedAs = await this.downloadAttachment(list, task, attachment);
        if (savedAs) {
          entry.savedAs = savedAs;
          savedAttachments.push(savedAs);
        }
      }
      entries.push(entry);
    }

    return { task, attachments: entries };
  }

  private async downloadAttachment(
    list: TodoTaskList,
    task: TodoTask,
    attachment: TaskAttachment
  ): Promise<string | null> {
    const content = await this.client.getAttachmentContent(list.id, task.id, attachment.id);
    if (!content) return null;

    const filename = attachmentFilename(attachment.name);
    this.ensureOutputDir();
    writeFileSync(join(this.outputDir, filename), content);
    this.logger.debug({ task: task.title, filename }, 'Attachment saved');
    return filename;
  }

  private ensureOutputDir(): void {
    if (!existsSync(this.outputDir)) {
      mkdirSync(this.outputDir, { recursive: true });
    }
  }
}
