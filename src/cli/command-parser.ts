import { PIPELINE_STAGES } from '../briefing/config/briefing.constants';
import { PipelineStage } from '../briefing/types/briefing.types';
import { isValidDateString } from '../briefing/utils/date.util';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'config' }
  | {
      kind: 'run';
      date?: string;
      language?: string;
      force: boolean;
      resume: boolean;
    }
  | { kind: 'stage'; stage: PipelineStage; date?: string; language?: string }
  | { kind: 'summarize'; date?: string; language?: string; force: boolean }
  | { kind: 'report'; date?: string; language?: string }
  | { kind: 'runs'; limit?: number }
  | { kind: 'index-query'; text: string; k?: number }
  | { kind: 'index-clear' }
  | { kind: 'chat' };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `Usage: sports-briefing <command> [options]

Commands:
  run [--date D] [--language L] [--force] [--resume]   run the daily pipeline
  stage <collect|index|persist|report> [--date D] [--language L]
  summarize [--date D] [--language L] [--force]        summarize the day's articles
  report [--date D] [--language L]                     (re)generate and print a report
  runs [--limit N]                                     list recent pipeline runs
  index query <text> [--k N]                           search the vector index
  index clear                                          empty the vector index
  chat                                                 ask questions interactively
  config                                               print the active configuration
  help                                                 show this message

Dates are YYYY-MM-DD; the default is today.`;

type ValueFlag = 'date' | 'language' | 'limit' | 'k';
type BooleanFlag = 'force' | 'resume';

const VALUE_FLAGS: readonly ValueFlag[] = ['date', 'language', 'limit', 'k'];
const BOOLEAN_FLAGS: readonly BooleanFlag[] = ['force', 'resume'];

interface ParsedArgs {
  positionals: string[];
  values: Map<ValueFlag, string>;
  booleans: Set<BooleanFlag>;
}

export function parseCommand(argv: readonly string[]): CliCommand {
  const [name, ...rest] = argv;
  if (!name || name === 'help' || name === '--help' || name === '-h') {
    return { kind: 'help' };
  }

  const args = parseArgs(rest);
  switch (name) {
    case 'config':
      expectOnly(args, name, [], 0);
      return { kind: 'config' };
    case 'run':
      expectOnly(args, name, ['date', 'language', 'force', 'resume'], 0);
      return {
        kind: 'run',
        ...dateAndLanguage(args),
        force: args.booleans.has('force'),
        resume: args.booleans.has('resume'),
      };
    case 'stage': {
      expectOnly(args, name, ['date', 'language'], 1);
      const stage = PIPELINE_STAGES.find((s) => s === args.positionals[0]);
      if (!stage) {
        throw new CliUsageError(
          `stage needs one of: ${PIPELINE_STAGES.join(', ')}`,
        );
      }
      return { kind: 'stage', stage, ...dateAndLanguage(args) };
    }
    case 'summarize':
      expectOnly(args, name, ['date', 'language', 'force'], 0);
      return {
        kind: 'summarize',
        ...dateAndLanguage(args),
        force: args.booleans.has('force'),
      };
    case 'report':
      expectOnly(args, name, ['date', 'language'], 0);
      return { kind: 'report', ...dateAndLanguage(args) };
    case 'runs':
      expectOnly(args, name, ['limit'], 0);
      return { kind: 'runs', limit: positiveInt(args, 'limit') };
    case 'index':
      return parseIndexCommand(args);
    case 'chat':
      expectOnly(args, name, [], 0);
      return { kind: 'chat' };
    default:
      throw new CliUsageError(`unknown command: ${name}`);
  }
}

function parseIndexCommand(args: ParsedArgs): CliCommand {
  const [sub, ...text] = args.positionals;
  if (sub === 'clear') {
    expectOnly(args, 'index clear', [], 1);
    return { kind: 'index-clear' };
  }
  if (sub === 'query') {
    expectOnly(args, 'index query', ['k'], args.positionals.length);
    const query = text.join(' ').trim();
    if (!query) {
      throw new CliUsageError('index query needs search text');
    }
    return { kind: 'index-query', text: query, k: positiveInt(args, 'k') };
  }
  throw new CliUsageError('index needs a subcommand: query or clear');
}

function parseArgs(args: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    positionals: [],
    values: new Map(),
    booleans: new Set(),
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      parsed.positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    const booleanFlag = BOOLEAN_FLAGS.find((f) => f === flag);
    if (booleanFlag) {
      if (inline !== undefined) {
        throw new CliUsageError(`--${flag} takes no value`);
      }
      parsed.booleans.add(booleanFlag);
      continue;
    }

    const valueFlag = VALUE_FLAGS.find((f) => f === flag);
    if (valueFlag) {
      const value = inline ?? args[i + 1];
      if (inline === undefined) {
        i += 1;
      }
      if (value === undefined || value === '' || value.startsWith('--')) {
        throw new CliUsageError(`--${flag} needs a value`);
      }
      parsed.values.set(valueFlag, value);
      continue;
    }

    throw new CliUsageError(`unknown option: --${flag}`);
  }

  return parsed;
}

function expectOnly(
  args: ParsedArgs,
  command: string,
  allowed: readonly (ValueFlag | BooleanFlag)[],
  positionals: number,
): void {
  const used = [...args.values.keys(), ...args.booleans];
  const unexpected = used.find((flag) => !allowed.includes(flag));
  if (unexpected) {
    throw new CliUsageError(`${command} does not take --${unexpected}`);
  }
  if (args.positionals.length > positionals) {
    throw new CliUsageError(
      `${command}: unexpected argument ${args.positionals[positionals]}`,
    );
  }
}

function dateAndLanguage(args: ParsedArgs): { date?: string; language?: string } {
  const date = args.values.get('date');
  if (date !== undefined && !isValidDateString(date)) {
    throw new CliUsageError(`--date must be YYYY-MM-DD, got ${date}`);
  }
  const language = args.values.get('language');
  return {
    ...(date ? { date } : {}),
    ...(language ? { language } : {}),
  };
}

function positiveInt(args: ParsedArgs, flag: 'limit' | 'k'): number | undefined {
  const raw = args.values.get(flag);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new CliUsageError(`--${flag} must be a positive integer`);
  }
  return value;
}
