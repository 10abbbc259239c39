import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ensureDir, writeJSONFile } from '../core/utils';
import { LedgerEvent } from '../core/types';

const ledgerEventSchema = z.object({
  id: z.string(),
  runId: z.string(),
  timestamp: z.string(),
  type: z.enum(['BACKTEST_STARTED', 'BACKTEST_COMPLETED', 'BACKTEST_FAILED']),
  details: z.record(z.unknown()).optional()
});

export const getLedgerFile = () =>
  process.env.LEDGER_FILE
    ? path.resolve(process.env.LEDGER_FILE)
    : path.join(path.resolve(process.cwd(), 'ledger'), 'events.jsonl');

export const getRunsDir = () => path.resolve(process.cwd(), process.env.RUNS_DIR || 'runs');

export const appendLedgerEvent = (event: LedgerEvent) => {
  const ledgerFile = getLedgerFile();
  ensureDir(path.dirname(ledgerFile));
  fs.appendFileSync(ledgerFile, `${JSON.stringify(event)}\n`);
};

// lines that are not valid JSON or not a known event are skipped
const parseLine = (line: string): LedgerEvent | undefined => {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = ledgerEventSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
};

export const readLedgerEvents = (): LedgerEvent[] => {
  const ledgerFile = getLedgerFile();
  if (!fs.existsSync(ledgerFile)) return [];
  const content = fs.readFileSync(ledgerFile, 'utf-8');
  const lines = content.trim().length ? content.trim().split('\n') : [];
  return lines.map(parseLine).filter((v): v is LedgerEvent => Boolean(v));
};

export const readEventsForRun = (runId: string): LedgerEvent[] => {
  return readLedgerEvents().filter((e) => e.runId === runId);
};

export const runDir = (runId: string) => path.join(getRunsDir(), runId);

export const writeRunArtifact = (runId: string, fileName: string, data: unknown) => {
  const filePath = path.join(runDir(runId), fileName);
  if (typeof data === 'string') {
    ensureDir(path.dirname(filePath));
    fs.writeFileSync(filePath, data);
    return filePath;
  }
  writeJSONFile(filePath, data);
  return filePath;
};

export const readRunArtifact = (runId: string, fileName: string): unknown => {
  const filePath = path.join(runDir(runId), fileName);
  if (!fs.existsSync(filePath)) return undefined;
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
};
