import { z } from 'zod';

export type BenchConfig = {
  samples: number;
  range: number;
  iterations: number;
  seed?: number;
  logLevel: 'silent' | 'info' | 'debug';
};

const benchEnvSchema = z.object({
  BENCH_SAMPLES: z.coerce.number().int().positive().default(1000),
  BENCH_RANGE: z.coerce.number().positive().finite().default(1000),
  BENCH_ITERATIONS: z.coerce.number().int().positive().default(200),
  // mulberry32 keeps only the low 32 bits of its seed
  BENCH_SEED: z.coerce.number().int().min(0).max(0xffffffff).optional(),
  LOG_LEVEL: z.enum(['silent', 'info', 'debug']).default('info'),
});

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[]) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Unset and blank variables fall back to defaults
function pickDefined(env: NodeJS.ProcessEnv, keys: readonly string[]) {
  const out: Record<string, string> = {};
  for (const k of keys) {
    const v = env[k]?.trim();
    if (v) out[k] = k === 'LOG_LEVEL' ? v.toLowerCase() : v;
  }
  return out;
}

export function loadBenchConfig(env: NodeJS.ProcessEnv = process.env): BenchConfig {
  const parsed = benchEnvSchema.safeParse(pickDefined(env, Object.keys(benchEnvSchema.shape)));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid bench configuration: ${issues.join('; ')}`, issues);
  }
  const e = parsed.data;
  return {
    samples: e.BENCH_SAMPLES,
    range: e.BENCH_RANGE,
    iterations: e.BENCH_ITERATIONS,
    ...(e.BENCH_SEED !== undefined ? { seed: e.BENCH_SEED } : {}),
    logLevel: e.LOG_LEVEL,
  };
}
