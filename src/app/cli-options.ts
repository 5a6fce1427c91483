import { parseArgs } from 'node:util';

import { err, fromThrowable, ok, type Result } from 'neverthrow';

import { describeCause, type AppError } from '../common/types/errors.js';
import { extractYearFromName } from '../modules/text-normalization/index.js';

export interface CliOptions {
  /** Single fiscal year to process; every year directory when undefined */
  year: number | undefined;
  inputDir: string | undefined;
  outputDir: string | undefined;
  /** Explicit `--no-profiles` */
  skipProfiles: boolean;
  help: boolean;
}

export interface CliUsageError extends AppError {
  readonly type: 'CliUsageError';
}

const createCliUsageError = (message: string, cause?: unknown): CliUsageError => ({
  type: 'CliUsageError',
  message,
  ...(cause !== undefined && { cause }),
});

export const USAGE = `Usage: rs-tables [options]

Options:
  --year <YYYY>     Process one fiscal year (also accepts year_YYYY or archive names)
  --input <dir>     Directory with year_<YYYY>/*.csv source sheets
  --output <dir>    Directory receiving the RS tables
  --no-profiles     Do not write schema profiles
  -h, --help        Show this message
`;

const parseYearOption = (value: string): number | null => {
  if (/^\d{4}$/.test(value)) return Number.parseInt(value, 10);
  return extractYearFromName(value);
};

const CLI_ARGS = {
  year: { type: 'string' },
  input: { type: 'string' },
  output: { type: 'string' },
  'no-profiles': { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

const readArgs = (argv: readonly string[]) =>
  parseArgs({ args: [...argv], options: CLI_ARGS, strict: true, allowPositionals: false });

const safeReadArgs = fromThrowable(readArgs, (error) =>
  createCliUsageError(describeCause(error), error)
);

export const parseCliOptions = (argv: readonly string[]): Result<CliOptions, CliUsageError> => {
  const parsed = safeReadArgs(argv);
  if (parsed.isErr()) {
    return err(parsed.error);
  }

  const { values } = parsed.value;
  let year: number | undefined;
  if (values.year !== undefined) {
    const resolved = parseYearOption(values.year);
    if (resolved === null) {
      return err(createCliUsageError(`Cannot read a fiscal year from --year ${values.year}`));
    }
    year = resolved;
  }

  return ok({
    year,
    inputDir: values.input,
    outputDir: values.output,
    skipProfiles: values['no-profiles'] === true,
    help: values.help === true,
  });
};
