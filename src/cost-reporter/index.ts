import { z } from 'zod';
import { loadConfig } from './config';
import { fetchCostReport } from './cost-fetcher';
import { CostReportError, ExitCodes } from './errors';
import { formatCostReport } from './formatter';
import { httpsGet } from './http-transport';
import { createLogger } from './logger';
import { resolvePeriod } from './period-resolver';
import type { CostReporterConfig, HttpTransport } from './types';

const OutputFormatSchema = z.enum(['table', 'json'], {
  errorMap: () => ({ message: 'Format must be one of: table, json' }),
});

const RunInputSchema = z.object({
  period: z.string().trim().min(1, 'A period is required'),
  format: OutputFormatSchema.default('table'),
  verbose: z.boolean().default(false),
});

/** Raw invocation input; validated by RunInputSchema before anything runs. */
export interface RunInput {
  period: string;
  format?: string;
  verbose?: boolean;
}

export interface RunDependencies {
  now: () => Date;
  loadConfig: () => CostReporterConfig;
  transport: HttpTransport;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export const defaultDependencies: RunDependencies = {
  now: () => new Date(),
  loadConfig: () => loadConfig(),
  transport: httpsGet,
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

function describeFailure(error: unknown): { message: string; exitCode: number } {
  if (error instanceof CostReportError) {
    return { message: error.message, exitCode: error.exitCode };
  }

  if (error instanceof z.ZodError) {
    const formattedErrors = error.errors.map((err) =>
      err.path.length > 0 ? `${err.path.join('.')}: ${err.message}` : err.message
    );
    return { message: `Invalid input: ${formattedErrors.join('; ')}`, exitCode: ExitCodes.UNEXPECTED };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { message: `Unexpected error: ${message}`, exitCode: ExitCodes.UNEXPECTED };
}

/**
 * Resolves the period, fetches the report and writes it in the requested format.
 * Returns the process exit code. The report is rendered in full before the single write
 * to stdout, so a failure never leaves partial output behind.
 */
export async function runCostReport(
  input: RunInput,
  deps: RunDependencies = defaultDependencies
): Promise<number> {
  try {
    const { period, format, verbose } = RunInputSchema.parse(input);
    const logger = createLogger(verbose);

    const range = resolvePeriod(period, deps.now());
    logger.debug(`Resolved period '${period}'`, { start: range.start, end: range.end });

    const config = deps.loadConfig();
    const report = await fetchCostReport(range, config.apiKey, {
      baseUrl: config.baseUrl,
      transport: deps.transport,
      logger,
    });

    deps.stdout(formatCostReport(report, format));
    return ExitCodes.SUCCESS;
  } catch (error) {
    const { message, exitCode } = describeFailure(error);
    deps.stderr(`Error: ${message}\n`);
    return exitCode;
  }
}
