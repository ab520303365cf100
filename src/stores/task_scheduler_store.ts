/**
 * stores/task_scheduler_store.ts
 *
 * Native store for one Task Scheduler folder.
 *
 * readRaw() exports every task of the folder into a single <Tasks>
 * document, each task preceded by a `<!-- \folder\name -->` comment.
 * writeRaw() takes a document of the same shape, registers every task in
 * it (overwriting by name) and then unregisters tasks of the folder that
 * the document no longer lists.
 *
 * Task Scheduler has no transactions. The document is loaded and checked
 * by System.Xml before the first registration, so a malformed document
 * changes nothing; a failure halfway through registration can still
 * leave the folder partially updated.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { NativeStore } from '../core/types';
import { scopedLogger } from '../core/logger';
import { DEFAULT_TASK_FOLDER, normalizeFolder } from '../codecs/windows_codec';
import { StoreIOError, describeFailure } from '../core/errors';
import { ps, psQuote } from './powershell';

const log = scopedLogger('stores/task_scheduler_store');

export interface TaskSchedulerStoreOptions {
  folder?: string;
  timeoutMs?: number;
}

export class TaskSchedulerStore implements NativeStore {
  readonly name = 'task-scheduler';
  readonly folder: string;
  private readonly timeoutMs: number;

  constructor(options: TaskSchedulerStoreOptions = {}) {
    this.folder = normalizeFolder(options.folder ?? DEFAULT_TASK_FOLDER);
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  readRaw(): string {
    const script = `
      $ErrorActionPreference = 'Stop';
      [Console]::OutputEncoding = [System.Text.Encoding]::UTF8;
      $path = ${psQuote(this.folder)};
      $sb = New-Object System.Text.StringBuilder;
      [void]$sb.AppendLine('<?xml version="1.0" encoding="UTF-16"?>');
      [void]$sb.AppendLine('<Tasks>');
      foreach ($t in @(Get-ScheduledTask -TaskPath $path -ErrorAction SilentlyContinue)) {
        $xml = Export-ScheduledTask -TaskName $t.TaskName -TaskPath $t.TaskPath;
        $xml = $xml -replace '^\\s*<\\?xml[^>]*\\?>\\s*', '';
        [void]$sb.AppendLine("<!-- $($t.TaskPath)$($t.TaskName) -->");
        [void]$sb.AppendLine($xml.Trim());
      }
      [void]$sb.AppendLine('</Tasks>');
      $sb.ToString();
    `;

    const raw = ps(script, { store: this.name, operation: 'read', timeoutMs: this.timeoutMs });
    log.debug({ folder: this.folder, bytes: raw.length }, 'Exported task folder');
    return raw;
  }

  writeRaw(raw: string): void {
    const dir = mkdtempSync(path.join(tmpdir(), 'crossched-'));
    const file = path.join(dir, 'tasks.xml');
    try {
      try {
        // UTF-16LE with BOM, matching the declaration the codec writes
        writeFileSync(file, `\uFEFF${raw}`, 'utf16le');
      } catch (e) {
        throw new StoreIOError(this.name, 'write', describeFailure(e), { file });
      }

      const script = `
        $ErrorActionPreference = 'Stop';
        $path = ${psQuote(this.folder)};
        $doc = New-Object System.Xml.XmlDocument;
        $doc.Load(${psQuote(file)});
        $keep = @{};
        $name = $null;
        foreach ($node in $doc.DocumentElement.ChildNodes) {
          if ($node.NodeType -eq [System.Xml.XmlNodeType]::Comment) {
            $name = ($node.Value.Trim() -split '\\\\')[-1];
            continue;
          }
          if ($node.NodeType -ne [System.Xml.XmlNodeType]::Element) { continue; }
          if ($node.LocalName -eq 'Task') {
            $uri = $node.RegistrationInfo.URI;
            if ($uri) { $name = ($uri -split '\\\\')[-1]; }
            if (-not $name) { throw 'Task definition without a name'; }
            Register-ScheduledTask -Xml $node.OuterXml -TaskName $name -TaskPath $path -Force | Out-Null;
            $keep[$name] = $true;
          }
          $name = $null;
        }
        foreach ($t in @(Get-ScheduledTask -TaskPath $path -ErrorAction SilentlyContinue)) {
          if (-not $keep.ContainsKey($t.TaskName)) {
            Unregister-ScheduledTask -TaskName $t.TaskName -TaskPath $path -Confirm:$false;
          }
        }
      `;

      ps(script, { store: this.name, operation: 'write', timeoutMs: this.timeoutMs });
      log.debug({ folder: this.folder, bytes: raw.length }, 'Task folder updated');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  }
}
