import * as path from 'node:path';
import * as logger from '../utils/logger.js';
import type { CursorLocation } from '../status/cursor.js';
import type { StatusBuffer } from './StatusBuffer.js';

/**
 * Open status buffers, one per repository root.
 *
 * Owned by the application and handed to whatever needs to reach every
 * buffer (bulk refresh and reset). Cursor locations of closed buffers are
 * kept so a buffer reopened for the same root starts where the last one was.
 */
export class StatusBufferRegistry {
  private buffers = new Map<string, StatusBuffer>();
  private closedLocations = new Map<string, CursorLocation>();

  private key(root: string): string {
    return path.resolve(root);
  }

  /**
   * Buffer for `root`, created with `create` when none is open. A new buffer
   * is refreshed once before it is returned.
   */
  async open(root: string, create: () => StatusBuffer): Promise<StatusBuffer> {
    const key = this.key(root);
    const existing = this.buffers.get(key);
    if (existing) return existing;

    logger.info(`Opening status buffer for ${key}`);
    const buffer = create();
    this.buffers.set(key, buffer);
    buffer.on('close', () => {
      this.close(key).catch((err) => {
        logger.error(`Failed to close buffer for ${key}`, err);
      });
    });

    const saved = this.closedLocations.get(key);
    if (saved) {
      buffer.restoreCursor(saved);
      this.closedLocations.delete(key);
    }

    await buffer.refresh('open');
    return buffer;
  }

  find(root: string): StatusBuffer | undefined {
    return this.buffers.get(this.key(root));
  }

  get size(): number {
    return this.buffers.size;
  }

  roots(): string[] {
    return [...this.buffers.keys()];
  }

  /** Close the buffer for `root`, remembering its cursor. */
  async close(root: string): Promise<void> {
    const key = this.key(root);
    const buffer = this.buffers.get(key);
    if (!buffer) return;

    this.buffers.delete(key);
    const location = buffer.cursorLocation();
    if (location) this.closedLocations.set(key, location);
    await buffer.dispose();
  }

  async closeAll(): Promise<void> {
    for (const root of this.roots()) {
      await this.close(root);
    }
  }

  async refreshAll(reason: string = 'refresh-all'): Promise<void> {
    await Promise.all([...this.buffers.values()].map((b) => b.refresh(reason)));
  }

  async resetAll(): Promise<void> {
    await Promise.all([...this.buffers.values()].map((b) => b.reset()));
  }
}
