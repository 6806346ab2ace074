export interface CliArgs {
  inputPath: string;
  outputPath: string;
  sourceLanguage: string;
  targetLanguage: string;
  concurrency?: number | undefined;
  failFast: boolean;
  help: boolean;
}

export const USAGE = [
  'Usage: page-translate <input.pptx> <output.pptx> --from <language> --to <language> [options]',
  '',
  'Options:',
  '  --from <language>     Source language (e.g. German)',
  '  --to <language>       Target language (e.g. English)',
  '  --concurrency <n>     Pages processed at the same time (0 = all pages)',
  '  --fail-fast           Stop at the first failed page and do not save',
  '  -h, --help            Show this help',
].join('\n');

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * `--name value`와 `--name=value` 둘 다 허용
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let sourceLanguage = '';
  let targetLanguage = '';
  let concurrency: number | undefined;
  let failFast = false;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inlineValue = eq === -1 ? undefined : arg.slice(eq + 1);

    const takeValue = (): string => {
      if (inlineValue !== undefined) return inlineValue;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new CliUsageError(`Missing value for ${flag}`);
      }
      i++;
      return next;
    };

    if (flag === '--from') {
      sourceLanguage = takeValue();
    } else if (flag === '--to') {
      targetLanguage = takeValue();
    } else if (flag === '--concurrency') {
      const raw = takeValue();
      const n = Number(raw);
      if (!Number.isInteger(n) || n < 0) {
        throw new CliUsageError(`--concurrency must be a non-negative integer, got "${raw}"`);
      }
      concurrency = n;
    } else if (flag === '--fail-fast') {
      failFast = true;
    } else if (flag === '--help' || flag === '-h') {
      help = true;
    } else if (flag.startsWith('-')) {
      throw new CliUsageError(`Unknown option: ${flag}`);
    } else {
      positional.push(arg);
    }
  }

  if (help) {
    return { inputPath: '', outputPath: '', sourceLanguage, targetLanguage, concurrency, failFast, help };
  }

  const [inputPath, outputPath, ...rest] = positional;
  if (!inputPath || !outputPath) {
    throw new CliUsageError('Input and output paths are required');
  }
  if (rest.length > 0) {
    throw new CliUsageError(`Unexpected argument: ${rest[0]}`);
  }
  if (!sourceLanguage || !targetLanguage) {
    throw new CliUsageError('Both --from and --to are required');
  }
  if (inputPath === outputPath) {
    throw new CliUsageError('Output path must differ from the input path');
  }

  return { inputPath, outputPath, sourceLanguage, targetLanguage, concurrency, failFast, help };
}
