import { z } from 'zod';
import { CliError, ExitCode } from './cli-error';
import { sampleFunctions, sampleObjectives } from './functions';

const pointSchema = z.string().transform((raw, ctx) => {
  const parts = raw.split(',').map(p => p.trim());
  const coords = parts.map(Number);
  if (parts.some(p => p === '') || coords.some(c => !Number.isFinite(c))) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `--start must be comma-separated numbers, got "${raw}"` });
    return z.NEVER;
  }
  return coords;
});

export const deriveSchema = z.object({
  fn: z.string().refine(name => name in sampleFunctions, name => ({ message: `Unknown function "${name}"` })),
  at: z.coerce.number().finite("--at must be a finite number"),
});

export type DeriveArgs = z.infer<typeof deriveSchema>;

export const minimizeSchema = z.object({
  fn: z.string().refine(name => name in sampleObjectives, name => ({ message: `Unknown objective "${name}"` })),
  start: pointSchema,
  learningRate: z.coerce.number().positive("--learning-rate must be positive").default(0.25),
  tolerance: z.coerce.number().positive("--tolerance must be positive").default(1e-5),
  maxIterations: z.coerce.number().int().min(1, "--max-iterations must be at least 1").default(10000),
  verbose: z.boolean().default(false),
});

export type MinimizeArgs = z.infer<typeof minimizeSchema>;

/**
 * Validates parsed command-line arguments; failures become a CliError with
 * `ExitCode.invalidArguments`.
 */
export function parseArgs<S extends z.ZodTypeAny>(schema: S, argv: unknown): z.infer<S> {
  const result = schema.safeParse(argv);
  if (!result.success) {
    const issues = result.error.issues.map(issue => issue.message).join('; ');
    throw new CliError(`Invalid arguments: ${issues}`, ExitCode.invalidArguments);
  }
  return result.data;
}
