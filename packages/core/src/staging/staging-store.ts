import * as fs from 'fs/promises';
import * as path from 'path';
import { IOFailureError } from '../errors.js';
import { DebugLogger } from '../utils/logger.js';

const SAFE_ID = /^[A-Za-z0-9][A-Za-z0-9_-]{0,127}$/;

/**
 * Whether a transfer id can be used as a file name
 */
export function isSafeTransferId(id: string): boolean {
  return SAFE_ID.test(id);
}

/**
 * Temporary file storage keyed by transfer id.
 *
 * A missing entry is a normal state (the transfer finished or was
 * rejected), so `get` returns undefined rather than throwing. Any other
 * filesystem failure surfaces as IOFailureError.
 */
export class StagingStore {
  private readonly logger = new DebugLogger('StagingStore');

  constructor(private readonly dir: string) {}

  get directory(): string {
    return this.dir;
  }

  async put(transferId: string, data: Buffer): Promise<void> {
    const filePath = this.pathFor(transferId);
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(filePath, data);
    } catch (err) {
      throw new IOFailureError(`Failed to stage ${transferId}`, { cause: err });
    }
    this.logger.debug(`Staged ${transferId} (${data.length} bytes)`);
  }

  async get(transferId: string): Promise<Buffer | undefined> {
    try {
      return await fs.readFile(this.pathFor(transferId));
    } catch (err) {
      if (isMissing(err)) {
        return undefined;
      }
      throw new IOFailureError(`Failed to read staged ${transferId}`, { cause: err });
    }
  }

  async has(transferId: string): Promise<boolean> {
    try {
      await fs.access(this.pathFor(transferId));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Remove staged bytes; a no-op when there are none
   */
  async delete(transferId: string): Promise<void> {
    try {
      await fs.rm(this.pathFor(transferId), { force: true });
    } catch (err) {
      throw new IOFailureError(`Failed to delete staged ${transferId}`, { cause: err });
    }
    this.logger.debug(`Deleted staged ${transferId}`);
  }

  /**
   * Move staged bytes out of the store to `destination`
   */
  async moveTo(transferId: string, destination: string): Promise<void> {
    const source = this.pathFor(transferId);
    try {
      await fs.mkdir(path.dirname(destination), { recursive: true });
      try {
        await fs.rename(source, destination);
      } catch (err) {
        // rename does not cross filesystems
        if (!hasCode(err, 'EXDEV')) throw err;
        await fs.copyFile(source, destination);
        await fs.rm(source, { force: true });
      }
    } catch (err) {
      throw new IOFailureError(`Failed to move staged ${transferId}`, { cause: err });
    }
    this.logger.debug(`Moved ${transferId} to ${destination}`);
  }

  /**
   * Remove the whole staging directory
   */
  async clear(): Promise<void> {
    await fs.rm(this.dir, { recursive: true, force: true });
  }

  private pathFor(transferId: string): string {
    if (!isSafeTransferId(transferId)) {
      throw new IOFailureError(`Invalid transfer id: ${transferId}`);
    }
    return path.join(this.dir, transferId);
  }
}

function hasCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

function isMissing(err: unknown): boolean {
  return hasCode(err, 'ENOENT');
}
