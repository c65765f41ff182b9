/**
 * Text rendering for the terminal
 */

import type { ActionResult, AgentStatus, KeyRecord, LogEntry } from '../types.js';

export function keyTypeLabel(record: Pick<KeyRecord, 'keyType' | 'bitLength'>): string {
  return record.bitLength !== undefined ? `${record.keyType}-${record.bitLength}` : record.keyType;
}

export function formatKeyRow(record: KeyRecord): string {
  const marker = record.loadedInAgent ? '●' : '○';
  const columns = [
    `${marker} ${record.name.padEnd(24)}`,
    keyTypeLabel(record).padEnd(12),
    (record.fingerprint ?? '-').padEnd(51),
    record.comment ?? ''
  ];
  return columns.join(' ').trimEnd();
}

export function formatKeyTable(keys: readonly KeyRecord[], directory: string): string {
  if (keys.length === 0) {
    return `No keys in ${directory}`;
  }
  const header = `  ${'NAME'.padEnd(24)} ${'TYPE'.padEnd(12)} ${'FINGERPRINT'.padEnd(51)} COMMENT`;
  return [header, ...keys.map(formatKeyRow)].join('\n');
}

export function formatAgentStatus(agent: AgentStatus): string {
  if (agent.status === 'unknown') {
    return `Agent: unavailable (${agent.message})`;
  }
  const count = agent.identities.length;
  return `Agent: ${count} ${count === 1 ? 'identity' : 'identities'} loaded`;
}

export function formatLogEntry(entry: LogEntry): string {
  const time = entry.timestamp.toISOString().slice(11, 19);
  const head = `#${entry.seq} ${time} ${entry.action} ${entry.target}`;
  const outcome = entry.outcome.status === 'success'
    ? `ok: ${entry.outcome.message}`
    : `${entry.outcome.reason}: ${entry.outcome.message}`;

  const lines = [`${head} ${outcome}`];
  for (const step of entry.steps ?? []) {
    lines.push(`    ${step.step} ${step.status}: ${step.message}`);
  }
  for (const warning of entry.warnings ?? []) {
    lines.push(`    warning: ${warning}`);
  }
  if (entry.command) {
    lines.push(`    $ ${entry.command}`);
  }
  return lines.join('\n');
}

/** The message a result carries for the user */
export function resultMessage<T>(result: ActionResult<T>): string {
  if (!result.ok) {
    return result.message;
  }
  return result.entry?.outcome.message ?? 'Done';
}
