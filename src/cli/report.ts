import 'dotenv/config';
import { Command } from 'commander';
import { z } from 'zod';
import { formatSummary } from '../analytics/format';
import { getRecentRuns, getRunStatus } from '../ledger/ledger';
import { readRunArtifact } from '../ledger/storage';

const summarySchema = z.object({
  totalTrades: z.number(),
  wins: z.number(),
  losses: z.number(),
  winPct: z.number(),
  largestLoss: z.number(),
  profitFactor: z.number().nullable(),
  averageProfit: z.number(),
  averagePnlPct: z.number(),
  totalPnlPct: z.number()
});

const balanceTailSchema = z.array(
  z.object({ date: z.string(), totalCapital: z.number(), accumulatedReturn: z.number() }).passthrough()
);

/** Lines describing a stored run; JSON has no Infinity, so a null profit factor reads back as one. */
export const describeRun = (runId: string, tail = 5): string[] => {
  const lines = [`Run ${runId}: ${getRunStatus(runId)}`];
  const summary = summarySchema.safeParse(readRunArtifact(runId, 'summary.json'));
  if (!summary.success) {
    lines.push('No summary.json for this run.');
    return lines;
  }
  lines.push(...formatSummary({ ...summary.data, profitFactor: summary.data.profitFactor ?? Infinity }));
  const balance = balanceTailSchema.safeParse(readRunArtifact(runId, 'balance.json'));
  if (balance.success && balance.data.length) {
    lines.push('', 'date        total_capital  accumulated_return');
    for (const row of balance.data.slice(-tail)) {
      lines.push(`${row.date}  ${row.totalCapital.toFixed(2).padStart(13)}  ${row.accumulatedReturn.toFixed(4)}`);
    }
  }
  return lines;
};

if (require.main === module) {
  const program = new Command();
  program
    .option('--run <id>', 'run to describe (defaults to the most recent)')
    .option('--tail <n>', 'balance rows to show', '5');
  const opts = program.parse(process.argv).opts<{ run?: string; tail: string }>();
  const runId = opts.run ?? getRecentRuns(1)[0]?.runId;
  if (!runId) {
    console.error('No backtest runs recorded.');
    process.exitCode = 1;
  } else {
    describeRun(runId, Number(opts.tail) || 5).forEach((line) => console.log(line));
  }
}
