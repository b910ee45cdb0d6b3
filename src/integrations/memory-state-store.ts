/**
 * In-memory StateStore
 *
 * Values are deep-copied on the way in and out, so callers never share
 * references with the store.
 */

import type { StateStore } from '../types/integrations.js';

export class MemoryStateStore implements StateStore {
  private readonly entries = new Map<string, unknown>();

  async get(key: string): Promise<unknown> {
    const value = this.entries.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  async put(key: string, value: unknown): Promise<void> {
    this.entries.set(key, structuredClone(value));
  }

  keys(): string[] {
    return Array.from(this.entries.keys()).sort();
  }

  clear(): void {
    this.entries.clear();
  }
}
