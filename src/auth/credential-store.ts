import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { Logger } from '../utils/logger.js';

/**
 * Persists the serialized MSAL token cache between runs.
 * The contents are opaque to everything but MSAL.
 */
export interface CredentialStore {
  /** Serialized cache, or null when nothing has been stored yet */
  load(): Promise<string | null>;
  /** Replace the stored cache entirely */
  save(serialized: string): Promise<void>;
}

export class FileCredentialStore implements CredentialStore {
  constructor(
    private readonly path: string,
    private readonly logger: Logger
  ) {}

  async load(): Promise<string | null> {
    if (!existsSync(this.path)) {
      this.logger.debug({ path: this.path }, 'No token cache found');
      return null;
    }

    try {
      const content = readFileSync(this.path, 'utf-8');
      return content.trim() ? content : null;
    } catch (error) {
      this.logger.warn({ err: error, path: this.path }, 'Failed to read token cache, starting empty');
      return null;
    }
  }

  async save(serialized: string): Promise<void> {
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    writeFileSync(this.path, serialized, 'utf-8');
    this.logger.debug({ path: this.path }, 'Token cache saved');
  }
}
