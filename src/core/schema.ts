import { z } from 'zod';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, { message: 'must be YYYY-MM-DD' });

export const allocationSchema = z
  .object({
    stocks: z.number().min(0).optional(),
    options: z.number().min(0).optional(),
    cash: z.number().min(0).optional()
  })
  .strict();

export const stockTargetSchema = z.object({
  symbol: z.string().min(1),
  percentage: z.number().min(0).max(1)
});

const rangeSchema = z
  .object({ min: z.number(), max: z.number() })
  .refine((r) => r.min <= r.max, { message: 'min must not exceed max' });

export const legConfigSchema = z.object({
  name: z.string().min(1),
  direction: z.enum(['BUY', 'SELL']),
  type: z.enum(['call', 'put']),
  underlying: z.string().min(1),
  entryDte: rangeSchema,
  exitDte: z.number().int().min(0).optional(),
  strikePct: rangeSchema.optional(),
  sort: z.enum(['strike_asc', 'strike_desc', 'dte_asc', 'dte_desc']).optional()
});

export const strategyConfigSchema = z.object({
  sharesPerContract: z.number().int().positive().default(100),
  exitThresholds: z
    .object({
      profitPct: z.number().positive().optional(),
      lossPct: z.number().positive().optional()
    })
    .optional(),
  legs: z.array(legConfigSchema)
});

const columnOverrides = z.record(z.string(), z.string().min(1));

export const dataConfigSchema = z.discriminatedUnion('source', [
  z.object({
    source: z.literal('stub'),
    start: isoDate,
    end: isoDate,
    seed: z.number().int().optional()
  }),
  z.object({
    source: z.literal('csv'),
    stocksFile: z.string().min(1),
    optionsFile: z.string().min(1),
    stockColumns: columnOverrides.optional(),
    optionColumns: columnOverrides.optional()
  })
]);

export const backtestConfigSchema = z.object({
  initialCapital: z.number().positive(),
  allocation: allocationSchema,
  stocks: z.array(stockTargetSchema).nonempty(),
  rebalanceFrequency: z.number().int().min(0).default(0),
  monthly: z.boolean().default(false),
  stopIfBroke: z.boolean().default(true),
  strategy: strategyConfigSchema,
  data: dataConfigSchema
});

export type LegConfig = z.infer<typeof legConfigSchema>;
export type StrategyConfig = z.infer<typeof strategyConfigSchema>;
export type DataConfig = z.infer<typeof dataConfigSchema>;
export type BacktestConfig = z.infer<typeof backtestConfigSchema>;

export const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);

export const validateBacktestConfig = (
  raw: unknown
): { success: true; value: BacktestConfig } | { success: false; errors: string[] } => {
  const result = backtestConfigSchema.safeParse(raw);
  if (result.success) {
    return { success: true, value: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
};
