/**
 * stores/crontab_store.ts
 *
 * Native store backed by the `crontab` binary: `crontab -l` to read,
 * `crontab <file>` to install. The binary swaps the whole table in one
 * step, so a failed install leaves the previous table in place.
 */

import { execFileSync } from 'child_process';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { NativeStore } from '../core/types';
import { StoreIOError, describeFailure } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('stores/crontab_store');

export interface CrontabStoreOptions {
  user?: string;              // crontab -u <user>; needs root
  binary?: string;
  timeoutMs?: number;
}

export class CrontabStore implements NativeStore {
  readonly name = 'crontab';
  private readonly binary: string;
  private readonly userArgs: string[];
  private readonly timeoutMs: number;

  constructor(options: CrontabStoreOptions = {}) {
    this.binary = options.binary ?? 'crontab';
    this.userArgs = options.user ? ['-u', options.user] : [];
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  readRaw(): string {
    try {
      const raw = execFileSync(this.binary, [...this.userArgs, '-l'], {
        encoding: 'utf-8',
        timeout: this.timeoutMs,
        stdio: ['pipe', 'pipe', 'pipe']
      });
      log.debug({ bytes: raw.length }, 'Read crontab');
      return raw;
    } catch (e) {
      const message = describeFailure(e);
      // An empty table is reported as an error by most crontab implementations
      if (/no crontab for/i.test(message)) return '';
      log.error({ error: message }, 'crontab -l failed');
      throw new StoreIOError(this.name, 'read', message);
    }
  }

  writeRaw(raw: string): void {
    const dir = mkdtempSync(path.join(tmpdir(), 'crossched-'));
    const file = path.join(dir, 'crontab');
    try {
      writeFileSync(file, raw, { encoding: 'utf-8', mode: 0o600 });
      execFileSync(this.binary, [...this.userArgs, file], {
        encoding: 'utf-8',
        timeout: this.timeoutMs,
        stdio: ['pipe', 'pipe', 'pipe']
      });
      log.debug({ bytes: raw.length }, 'Installed crontab');
    } catch (e) {
      const message = describeFailure(e);
      log.error({ error: message }, 'crontab install failed');
      throw new StoreIOError(this.name, 'write', message);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  }
}
