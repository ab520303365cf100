/**
 * stores/file_store.ts
 *
 * Native store backed by a crontab-format file, e.g. a drop-in under
 * /etc/cron.d. Writes go to a temporary file beside the target and are
 * renamed over it, so readers never see a half-written table.
 */

import { readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import * as path from 'path';
import { NativeStore } from '../core/types';
import { StoreIOError, describeFailure } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('stores/file_store');

function isMissing(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

export class FileStore implements NativeStore {
  readonly name: string;

  constructor(readonly filePath: string) {
    this.name = `file:${filePath}`;
  }

  readRaw(): string {
    try {
      return readFileSync(this.filePath, 'utf-8');
    } catch (e) {
      if (isMissing(e)) return '';
      throw new StoreIOError(this.name, 'read', describeFailure(e), { path: this.filePath });
    }
  }

  writeRaw(raw: string): void {
    const tmp = path.join(
      path.dirname(this.filePath),
      `.${path.basename(this.filePath)}.${process.pid}.tmp`
    );
    try {
      writeFileSync(tmp, raw, { encoding: 'utf-8', mode: 0o644 });
      renameSync(tmp, this.filePath);
      log.debug({ path: this.filePath, bytes: raw.length }, 'Replaced crontab file');
    } catch (e) {
      rmSync(tmp, { force: true });
      throw new StoreIOError(this.name, 'write', describeFailure(e), { path: this.filePath });
    }
  }
}
