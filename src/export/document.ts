/**
 * Output document for one task list.
 *
 * The layout is shared by both output formats; a DocumentFormat decides the
 * line syntax and how (or whether) a task body is rendered.
 */

import type { ExportFormat } from '../config.js';
import { isCompleted } from '../core/types.js';
import type { ItemBody, TodoTask } from '../core/types.js';
import { cleanMarkdown } from './markdown.js';
import type { MarkdownConverter } from './markdown.js';

export type FieldLabel = 'Task' | 'Status' | 'Due' | 'Reminder' | 'Attachments';

export interface AttachmentEntry {
  name: string;
  size: number;
  /** Local filename when the attachment content was written to disk */
  savedAs?: string;
}

export interface TaskEntry {
  task: TodoTask;
  attachments: AttachmentEntry[];
}

export interface DocumentFormat {
  readonly name: ExportFormat;
  readonly extension: 'md' | 'txt';
  listHeading(listName: string): string;
  field(label: FieldLabel, value?: string): string;
  attachmentItem(attachment: AttachmentEntry): string;
  savedAttachmentNote(filename: string): string;
  /** Body section lines, or null to leave the section out */
  content(body: ItemBody): string | null;
}

export function markdownFormat(convert: MarkdownConverter): DocumentFormat {
  return {
    name: 'markdown',
    extension: 'md',
    listHeading: (listName) => `# List: ${listName}`,
    field: (label, value) => {
      const marker = label === 'Task' ? '##' : '###';
      return value === undefined ? `${marker} ${label}:` : `${marker} ${label}: ${value}`;
    },
    attachmentItem: ({ name, size }) => `- ${name} (Size: ${size} bytes)`,
    savedAttachmentNote: (filename) => `  - Saved attachment: ${filename}`,
    content: (body) => {
      const rendered =
        body.contentType === 'html' ? cleanMarkdown(convert(body.content)) : body.content;
      if (!rendered.trim()) return null;
      return `### Content:\n${rendered}`;
    },
  };
}

export const plainTextFormat: DocumentFormat = {
  name: 'text',
  extension: 'txt',
  listHeading: (listName) => `List: ${listName}`,
  field: (label, value) => (value === undefined ? `  ${label}:` : `  ${label}: ${value}`),
  attachmentItem: ({ name, size }) => `    - ${name} (Size: ${size} bytes)`,
  savedAttachmentNote: (filename) => `      Saved attachment: ${filename}`,
  // Written verbatim, even when blank
  content: (body) => `  Content: ${body.content}`,
};

export function formatFor(format: ExportFormat, convert: MarkdownConverter): DocumentFormat {
  return format === 'markdown' ? markdownFormat(convert) : plainTextFormat;
}

export class DocumentBuilder {
  private blocks: string[][] = [];

  constructor(
    private readonly format: DocumentFormat,
    private readonly listName: string
  ) {}

  addTask({ task, attachments }: TaskEntry): this {
    const { format } = this;
    const lines = [
      format.field('Task', task.title),
      format.field('Status', isCompleted(task) ? 'Completed' : 'Not Completed'),
    ];

    if (task.dueDateTime) lines.push(format.field('Due', task.dueDateTime.dateTime));
    if (task.reminderDateTime) lines.push(format.field('Reminder', task.reminderDateTime.dateTime));

    if (attachments.length > 0) {
      lines.push(format.field('Attachments'));
      for (const attachment of attachments) {
        lines.push(format.attachmentItem(attachment));
        if (attachment.savedAs) lines.push(format.savedAttachmentNote(attachment.savedAs));
      }
    }

    if (task.body) {
      const content = format.content(task.body);
      if (content !== null) lines.push(content);
    }

    this.blocks.push(lines);
    return this;
  }

  get taskCount(): number {
    return this.blocks.length;
  }

  /**
   * Heading, two blank lines, then one block per task with two blank lines between blocks.
   */
  build(): string {
    const header = `${this.format.listHeading(this.listName)}\n\n\n`;
    const tasks = this.blocks.map((lines) => lines.map((line) => `${line}\n`).join(''));
    return header + tasks.join('\n\n');
  }
}
