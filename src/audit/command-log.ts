/**
 * Append-only command log
 *
 * Records every orchestrated action with its outcome and the external
 * command's output. Held in memory for the session; optionally mirrored to
 * a JSONL file (one entry per line) that is reloaded on the next start.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { errorMessage } from '../errors.js';
import { generateId } from '../utils/hash.js';
import { FAILURE_REASONS, LOG_ACTIONS, type FailureReason, type LogAction, type LogEntry, type LogEntryDraft, type Outcome, type StepOutcome } from '../types.js';

const DEFAULT_RAW_OUTPUT_LIMIT = 4096;

export interface CommandLogOptions {
  /** Ring size; 0 or undefined keeps every entry */
  maxEntries?: number;
  /** Bytes of raw output kept per entry */
  rawOutputLimit?: number;
  /** JSONL file to mirror entries to; in-memory only when omitted */
  persistPath?: string;
  onWarning?: (warning: string) => void;
}

export function truncateOutput(output: string, limit: number): string {
  const bytes = Buffer.byteLength(output, 'utf-8');
  if (bytes <= limit) return output;
  const kept = Buffer.from(output, 'utf-8').subarray(0, limit).toString('utf-8').replace(/\uFFFD$/, '');
  return `${kept}…[truncated ${bytes - Buffer.byteLength(kept, 'utf-8')} bytes]`;
}

export class CommandLog {
  private slots: Array<LogEntry | undefined>;
  private start = 0;
  private count = 0;
  private nextSeq = 1;
  private capacity: number;
  private rawOutputLimit: number;
  private persistPath?: string;
  private onWarning?: (warning: string) => void;
  private pendingWarnings: string[] = [];
  private initialized = false;

  constructor(options: CommandLogOptions = {}) {
    this.capacity = options.maxEntries && options.maxEntries > 0 ? options.maxEntries : 0;
    this.slots = this.capacity > 0 ? new Array<LogEntry | undefined>(this.capacity) : [];
    this.rawOutputLimit = options.rawOutputLimit ?? DEFAULT_RAW_OUTPUT_LIMIT;
    this.persistPath = options.persistPath;
    this.onWarning = options.onWarning;
  }

  get size(): number {
    return this.count;
  }

  get persistent(): boolean {
    return this.persistPath !== undefined;
  }

  /**
   * Reloads entries from the persistence file, when one is configured.
   */
  initialize(): void {
    if (this.initialized) return;
    this.initialized = true;
    if (!this.persistPath) return;

    try {
      fs.mkdirSync(path.dirname(this.persistPath), { recursive: true, mode: 0o700 });
    } catch (error) {
      this.warn(`PersistenceWarning: cannot create ${path.dirname(this.persistPath)}: ${errorMessage(error)}`);
      return;
    }
    if (!fs.existsSync(this.persistPath)) return;

    let content: string;
    try {
      content = fs.readFileSync(this.persistPath, 'utf-8');
    } catch (error) {
      this.warn(`PersistenceWarning: cannot read ${this.persistPath}: ${errorMessage(error)}`);
      return;
    }

    const lines = content.split('\n').filter(line => line.trim().length > 0);
    let skipped = 0;
    for (const line of lines) {
      const entry = decodeEntry(line);
      if (entry) {
        this.push(entry);
        this.nextSeq = Math.max(this.nextSeq, entry.seq + 1);
      } else {
        skipped++;
      }
    }
    if (skipped > 0) {
      this.warn(`PersistenceWarning: skipped ${skipped} unreadable line(s) in ${this.persistPath}`);
    }
  }

  /**
   * Stamps and stores an entry. Never throws: a failed file write keeps the
   * entry in memory and raises a PersistenceWarning instead.
   */
  append(draft: LogEntryDraft): LogEntry {
    const entry: LogEntry = {
      ...draft,
      id: generateId(),
      seq: this.nextSeq++,
      timestamp: new Date(),
      rawOutput: truncateOutput(draft.rawOutput, this.rawOutputLimit)
    };
    deepFreeze(entry);
    this.push(entry);

    if (this.persistPath) {
      try {
        fs.appendFileSync(this.persistPath, JSON.stringify(entry) + '\n', { mode: 0o600 });
      } catch (error) {
        this.warn(`PersistenceWarning: entry ${entry.seq} kept in memory only: ${errorMessage(error)}`);
      }
    }

    return entry;
  }

  private push(entry: LogEntry): void {
    if (this.capacity === 0) {
      this.slots.push(entry);
      this.count++;
      return;
    }
    const index = (this.start + this.count) % this.capacity;
    this.slots[index] = entry;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      // Full: the oldest entry was just overwritten
      this.start = (this.start + 1) % this.capacity;
    }
  }

  private at(offset: number): LogEntry | undefined {
    if (this.capacity === 0) return this.slots[offset];
    return this.slots[(this.start + offset) % this.capacity];
  }

  /** Oldest first */
  *entries(): Generator<LogEntry> {
    for (let i = 0; i < this.count; i++) {
      const entry = this.at(i);
      if (entry) yield entry;
    }
  }

  /** The last n entries, most recent last */
  tail(n: number = 10): LogEntry[] {
    const result: LogEntry[] = [];
    for (let i = Math.max(0, this.count - n); i < this.count; i++) {
      const entry = this.at(i);
      if (entry) result.push(entry);
    }
    return result;
  }

  *find(predicate: (entry: LogEntry) => boolean): Generator<LogEntry> {
    for (const entry of this.entries()) {
      if (predicate(entry)) yield entry;
    }
  }

  /** Returns and clears warnings raised since the last call */
  drainWarnings(): string[] {
    const warnings = this.pendingWarnings;
    this.pendingWarnings = [];
    return warnings;
  }

  private warn(warning: string): void {
    this.pendingWarnings.push(warning);
    this.onWarning?.(warning);
  }
}

function deepFreeze(entry: LogEntry): void {
  entry.steps?.forEach(step => Object.freeze(step));
  if (entry.steps) Object.freeze(entry.steps);
  if (entry.warnings) Object.freeze(entry.warnings);
  Object.freeze(entry.outcome);
  Object.freeze(entry);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeOutcome(value: unknown): Outcome | null {
  if (!isRecord(value) || typeof value['message'] !== 'string') return null;
  if (value['status'] === 'success') {
    return { status: 'success', message: value['message'] };
  }
  if (value['status'] === 'failure') {
    const reason = value['reason'];
    return isFailureReason(reason) ? { status: 'failure', reason, message: value['message'] } : null;
  }
  return null;
}

function decodeSteps(value: unknown): StepOutcome[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter(isRecord).flatMap((step): StepOutcome[] => {
    const status = step['status'];
    if (typeof step['step'] !== 'string' || typeof step['message'] !== 'string') return [];
    if (status !== 'ok' && status !== 'skipped' && status !== 'failed') return [];
    return [{ step: step['step'], status, message: step['message'] }];
  });
}

function isFailureReason(value: unknown): value is FailureReason {
  return typeof value === 'string' && FAILURE_REASONS.some(reason => reason === value);
}

function isLogAction(value: unknown): value is LogAction {
  return typeof value === 'string' && LOG_ACTIONS.some(action => action === value);
}

/**
 * Parses one persisted line back into an entry, or null if it is not one.
 */
export function decodeEntry(line: string): LogEntry | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  if (!isRecord(raw)) return null;

  const outcome = decodeOutcome(raw['outcome']);
  const timestamp = typeof raw['timestamp'] === 'string' ? new Date(raw['timestamp']) : null;
  if (
    !outcome ||
    !timestamp ||
    isNaN(timestamp.getTime()) ||
    typeof raw['id'] !== 'string' ||
    typeof raw['seq'] !== 'number' ||
    !isLogAction(raw['action']) ||
    typeof raw['target'] !== 'string'
  ) {
    return null;
  }

  const entry: LogEntry = {
    id: raw['id'],
    seq: raw['seq'],
    timestamp,
    action: raw['action'],
    target: raw['target'],
    outcome,
    rawOutput: typeof raw['rawOutput'] === 'string' ? raw['rawOutput'] : ''
  };
  if (typeof raw['command'] === 'string') entry.command = raw['command'];
  const steps = decodeSteps(raw['steps']);
  if (steps) entry.steps = steps;
  if (Array.isArray(raw['warnings'])) {
    entry.warnings = raw['warnings'].filter((w): w is string => typeof w === 'string');
  }
  deepFreeze(entry);
  return entry;
}

export function createCommandLog(options: CommandLogOptions = {}): CommandLog {
  return new CommandLog(options);
}
