/**
 * stores/powershell.ts
 *
 * Runs a PowerShell script and returns its stdout. Scripts are passed as
 * Base64 UTF-16LE through -EncodedCommand so nothing in them needs
 * shell quoting.
 */

import { execSync } from 'child_process';
import { StoreIOError, describeFailure } from '../core/errors';

export interface PowerShellOptions {
  store: string;
  operation: 'read' | 'write';
  timeoutMs?: number;
}

export function encodeScript(script: string): string {
  return Buffer.from(script, 'utf16le').toString('base64');
}

/** Single-quoted PowerShell literal. */
export function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function ps(script: string, options: PowerShellOptions): string {
  try {
    return execSync(
      `powershell -NoProfile -NonInteractive -ExecutionPolicy Bypass -EncodedCommand ${encodeScript(script)}`,
      { encoding: 'utf-8', timeout: options.timeoutMs ?? 15000, stdio: ['pipe', 'pipe', 'pipe'], windowsHide: true }
    );
  } catch (e) {
    throw new StoreIOError(options.store, options.operation, describeFailure(e));
  }
}
