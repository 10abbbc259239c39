import crypto from 'crypto';
import { LedgerEvent, LedgerEventType } from '../core/types';
import { appendLedgerEvent, readEventsForRun, readLedgerEvents } from './storage';

export const makeEvent = (runId: string, type: LedgerEventType, details?: Record<string, unknown>): LedgerEvent => ({
  id: crypto.randomUUID(),
  runId,
  timestamp: new Date().toISOString(),
  type,
  details
});

export const appendEvent = (event: LedgerEvent) => {
  appendLedgerEvent(event);
};

export type RunStatus = 'IN_PROGRESS' | 'COMPLETED' | 'FAILED' | 'UNKNOWN';

const statusOf = (type: LedgerEventType): RunStatus => {
  switch (type) {
    case 'BACKTEST_COMPLETED':
      return 'COMPLETED';
    case 'BACKTEST_FAILED':
      return 'FAILED';
    case 'BACKTEST_STARTED':
      return 'IN_PROGRESS';
    default:
      return 'UNKNOWN';
  }
};

const latest = (events: LedgerEvent[]): LedgerEvent | undefined =>
  events
    .slice()
    .sort((a, b) => new Date(a.timestamp).getTime() - new Date(b.timestamp).getTime())
    .at(-1);

export const getRunStatus = (runId: string): RunStatus => {
  const last = latest(readEventsForRun(runId));
  return last ? statusOf(last.type) : 'UNKNOWN';
};

export const getRecentRuns = (limit = 10): { runId: string; status: RunStatus }[] => {
  const byRun = new Map<string, LedgerEvent[]>();
  for (const evt of readLedgerEvents()) {
    const bucket = byRun.get(evt.runId);
    if (bucket) bucket.push(evt);
    else byRun.set(evt.runId, [evt]);
  }
  return Array.from(byRun.entries())
    .map(([runId, events]) => {
      const last = latest(events);
      return { runId, status: last ? statusOf(last.type) : 'UNKNOWN', ts: last ? new Date(last.timestamp).getTime() : 0 };
    })
    .sort((a, b) => b.ts - a.ts)
    .slice(0, limit)
    .map(({ runId, status }) => ({ runId, status }));
};
