import { Command } from 'commander';
import { defaultDependencies, runCostReport, type RunDependencies } from './index';

interface CliOptions {
  format: string;
  verbose?: boolean;
}

export function buildProgram(
  deps: RunDependencies = defaultDependencies,
  setExitCode: (code: number) => void = (code) => {
    process.exitCode = code;
  }
): Command {
  const program = new Command();

  program
    .name('cost-report')
    .description('Print the organization cost report for a time period (UTC)')
    .argument(
      '<period...>',
      "Time period, e.g. 'last week', 'last 7 days', 'january 2025', '2025-01-15', '2025-01-01 to 2025-01-15'"
    )
    .option('-f, --format <format>', 'Output format: table or json', 'table')
    .option('-v, --verbose', 'Write diagnostic logs to stderr')
    .configureOutput({
      writeOut: (text) => deps.stdout(text),
      writeErr: (text) => deps.stderr(text),
    })
    .action(async (words: string[], options: CliOptions) => {
      const exitCode = await runCostReport(
        {
          period: words.join(' '),
          format: options.format,
          verbose: options.verbose ?? false,
        },
        deps
      );
      setExitCode(exitCode);
    });

  return program;
}
