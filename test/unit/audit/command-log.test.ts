/**
 * Tests for the command log
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { CommandLog, createCommandLog, decodeEntry, truncateOutput } from '../../../src/audit/command-log.js';
import type { LogEntryDraft } from '../../../src/types.js';

function draft(target: string, overrides: Partial<LogEntryDraft> = {}): LogEntryDraft {
  return {
    action: 'view',
    target,
    outcome: { status: 'success', message: `Viewed ${target}` },
    rawOutput: '',
    ...overrides
  };
}

describe('CommandLog', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = path.join(os.tmpdir(), `sshdeck-log-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    fs.mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    if (fs.existsSync(testDir)) {
      fs.rmSync(testDir, { recursive: true, force: true });
    }
  });

  describe('append', () => {
    it('stamps sequence numbers, ids and completion times', () => {
      const log = createCommandLog();
      const before = Date.now();

      const first = log.append(draft('a'));
      const second = log.append(draft('b'));

      expect([first.seq, second.seq]).toEqual([1, 2]);
      expect(first.id).not.toBe(second.id);
      expect(first.timestamp.getTime()).toBeGreaterThanOrEqual(before);
      expect(log.size).toBe(2);
    });

    it('freezes entries', () => {
      const log = createCommandLog();
      const entry = log.append(draft('a', { steps: [{ step: 'trash', status: 'ok', message: 'moved' }] }));

      expect(Object.isFrozen(entry)).toBe(true);
      expect(Object.isFrozen(entry.outcome)).toBe(true);
      expect(Object.isFrozen(entry.steps?.[0])).toBe(true);
    });

    it('truncates raw output to the configured limit', () => {
      const log = createCommandLog({ rawOutputLimit: 64 });
      const entry = log.append(draft('a', { rawOutput: 'x'.repeat(100) }));

      expect(entry.rawOutput).toBe(`${'x'.repeat(64)}…[truncated 36 bytes]`);
    });
  });

  describe('reading', () => {
    it('drops the oldest entries when bounded', () => {
      const log = createCommandLog({ maxEntries: 3 });
      for (const target of ['a', 'b', 'c', 'd', 'e']) {
        log.append(draft(target));
      }

      expect([...log.entries()].map(e => e.target)).toEqual(['c', 'd', 'e']);
      expect(log.tail(2).map(e => e.seq)).toEqual([4, 5]);
      expect(log.size).toBe(3);
    });

    it('returns everything when asked for more than it holds', () => {
      const log = createCommandLog();
      log.append(draft('only'));

      expect(log.tail(50).map(e => e.target)).toEqual(['only']);
    });

    it('finds entries lazily, oldest first', () => {
      const log = createCommandLog();
      log.append(draft('a'));
      log.append(draft('b', { action: 'copy', outcome: { status: 'failure', reason: 'NoPublicKey', message: 'no .pub' } }));
      log.append(draft('c', { action: 'copy' }));

      const found = log.find(entry => entry.action === 'copy');
      expect(found.next().value?.target).toBe('b');
      expect([...found].map(e => e.target)).toEqual(['c']);
    });
  });

  describe('persistence', () => {
    it('mirrors entries to JSONL and reloads them on the next start', () => {
      const logPath = path.join(testDir, 'nested', 'command-log.jsonl');
      const first = new CommandLog({ persistPath: logPath });
      first.initialize();
      first.append(draft('a'));
      first.append(draft('b', { command: 'ssh-add /keys/b', warnings: ['careful'] }));

      const lines = fs.readFileSync(logPath, 'utf-8').trim().split('\n');
      expect(lines).toHaveLength(2);

      const second = new CommandLog({ persistPath: logPath });
      second.initialize();
      const reloaded = second.tail(10);

      expect(reloaded.map(e => e.target)).toEqual(['a', 'b']);
      expect(reloaded[1].command).toBe('ssh-add /keys/b');
      expect(reloaded[1].warnings).toEqual(['careful']);
      expect(reloaded[0].timestamp).toBeInstanceOf(Date);
      expect(second.append(draft('c')).seq).toBe(3);
    });

    it('skips unreadable lines with a warning', () => {
      const logPath = path.join(testDir, 'command-log.jsonl');
      const good = JSON.stringify({
        id: 'entry-1',
        seq: 7,
        timestamp: '2026-01-01T10:00:00.000Z',
        action: 'create',
        target: 'id_test',
        outcome: { status: 'success', message: 'Created' },
        rawOutput: ''
      });
      fs.writeFileSync(logPath, `${good}\nnot json\n{"seq": 8}\n`);

      const onWarning = vi.fn();
      const log = new CommandLog({ persistPath: logPath, onWarning });
      log.initialize();

      expect(log.size).toBe(1);
      expect(log.drainWarnings()).toEqual([`PersistenceWarning: skipped 2 unreadable line(s) in ${logPath}`]);
      expect(onWarning).toHaveBeenCalledTimes(1);
      expect(log.append(draft('next')).seq).toBe(8);
    });

    it('keeps the entry in memory when the file cannot be written', () => {
      // A directory where the file should be
      const logPath = path.join(testDir, 'blocked');
      fs.mkdirSync(logPath);
      const log = new CommandLog({ persistPath: logPath });

      const entry = log.append(draft('a'));

      expect(log.tail(1)).toEqual([entry]);
      const warnings = log.drainWarnings();
      expect(warnings).toHaveLength(1);
      expect(warnings[0].startsWith('PersistenceWarning: entry 1 kept in memory only:')).toBe(true);
      expect(log.drainWarnings()).toEqual([]);
    });
  });
});

describe('decodeEntry', () => {
  it('rejects unknown failure reasons and actions', () => {
    const base = {
      id: 'x',
      seq: 1,
      timestamp: '2026-01-01T10:00:00.000Z',
      target: 't',
      rawOutput: ''
    };
    expect(decodeEntry(JSON.stringify({ ...base, action: 'view', outcome: { status: 'failure', reason: 'Exploded', message: 'm' } }))).toBeNull();
    expect(decodeEntry(JSON.stringify({ ...base, action: 'rename', outcome: { status: 'success', message: 'm' } }))).toBeNull();
    expect(decodeEntry(JSON.stringify({ ...base, action: 'view', outcome: { status: 'failure', reason: 'ReadError', message: 'm' } }))?.outcome)
      .toEqual({ status: 'failure', reason: 'ReadError', message: 'm' });
  });
});

describe('truncateOutput', () => {
  it('does not split a multi-byte character', () => {
    expect(truncateOutput('éé', 3)).toBe('é…[truncated 2 bytes]');
    expect(truncateOutput('short', 64)).toBe('short');
  });
});
