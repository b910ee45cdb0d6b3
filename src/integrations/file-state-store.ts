/**
 * File-backed StateStore
 *
 * One JSON file per key inside a directory. Keys are URI-encoded into file
 * names; writes go to a temp file first and are renamed into place. Writes
 * to one key apply in call order.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { RolloutError } from '../api/errors.js';
import type { StateStore } from '../types/integrations.js';

export interface FileStateStoreOptions {
  directory: string;
  logger?: Logger;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class FileStateStore implements StateStore {
  private readonly directory: string;
  private readonly logger?: Logger;
  private ready?: Promise<void>;
  private readonly writes = new Map<string, Promise<void>>();

  constructor(options: FileStateStoreOptions) {
    this.directory = options.directory;
    this.logger = options.logger;
  }

  /**
   * @returns undefined when nothing was stored under the key
   * @throws {RolloutError} when the file exists but is not valid JSON
   */
  async get(key: string): Promise<unknown> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(key), 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }

    try {
      const value: unknown = JSON.parse(raw);
      return value;
    } catch (error) {
      throw new RolloutError('UnknownError', `Stored state for '${key}' is not valid JSON`, {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async put(key: string, value: unknown): Promise<void> {
    const content = JSON.stringify(value, null, 2);
    const write = (): Promise<void> => this.write(key, content);
    const previous = this.writes.get(key) ?? Promise.resolve();
    const next = previous.then(write, write);
    this.writes.set(key, next);
    try {
      await next;
    } finally {
      if (this.writes.get(key) === next) {
        this.writes.delete(key);
      }
    }
  }

  private async write(key: string, content: string): Promise<void> {
    await this.ensureDirectory();
    const target = this.pathFor(key);
    const temp = `${target}.${process.pid}.${randomUUID()}.tmp`;
    await writeFile(temp, content, 'utf8');
    await rename(temp, target);
    this.logger?.debug({ key, path: target }, 'State written');
  }

  private pathFor(key: string): string {
    return join(this.directory, `${encodeURIComponent(key)}.json`);
  }

  private ensureDirectory(): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(this.directory, { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          this.ready = undefined;
          throw error;
        }
      );
    }
    return this.ready;
  }
}
