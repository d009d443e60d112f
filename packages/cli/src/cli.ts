import { Command, InvalidArgumentError, Option } from 'commander';
import {
  OPERATION_KINDS,
  ScratchpayError,
  URGENCY_LEVELS,
  setLogLevel,
  type Urgency,
} from '@scratchpay/core';
import { Scratchpad } from '@scratchpay/sdk';

export interface CliOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliOptions {
  output?: CliOutput;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

interface ProgramOptions {
  op?: string;
  target?: string;
  amount: string;
  note: string;
  network?: string;
  meta?: Record<string, string>;
  listRecords?: boolean;
  summary?: boolean;
  listNetworks?: boolean;
  plan?: string;
  urgency?: Urgency;
  tags?: string[];
  hints?: string[];
  describe?: boolean;
  dataDir?: string;
  config?: string;
  verbose?: boolean;
}

type CliAction = 'payload' | 'plan' | 'list-records' | 'summary' | 'list-networks' | 'describe' | 'hints';

const ACTION_FLAGS: Record<CliAction, string> = {
  payload: '--op',
  plan: '--plan',
  'list-records': '--list-records',
  summary: '--summary',
  'list-networks': '--list-networks',
  describe: '--describe',
  hints: '--hints',
};

// Flags consumed by only some actions
const SCOPED_FLAGS = ['target', 'amount', 'note', 'network', 'meta', 'urgency', 'tags'] as const;

type ScopedFlag = (typeof SCOPED_FLAGS)[number];

const ACTION_SCOPED_FLAGS: Record<CliAction, readonly ScopedFlag[]> = {
  payload: ['target', 'amount', 'note', 'network', 'meta'],
  plan: ['urgency', 'tags'],
  'list-records': [],
  summary: [],
  'list-networks': [],
  describe: ['network'],
  hints: [],
};

const USAGE_EXIT_CODE = 2;

const defaultOutput: CliOutput = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function collectMetadata(value: string, previous: Record<string, string> | undefined): Record<string, string> {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got '${value}'.`);
  }
  return { ...previous, [value.slice(0, separator)]: value.slice(separator + 1) };
}

function resolveActions(options: ProgramOptions): CliAction[] {
  const actions: CliAction[] = [];
  if (options.op !== undefined) actions.push('payload');
  // With --op, the plan text is attached to the payload instead
  if (options.plan !== undefined && options.op === undefined) actions.push('plan');
  if (options.listRecords) actions.push('list-records');
  if (options.summary) actions.push('summary');
  if (options.listNetworks) actions.push('list-networks');
  if (options.describe) actions.push('describe');
  if (options.hints !== undefined) actions.push('hints');
  return actions;
}

export function createProgram(cliOptions: CliOptions = {}): Command {
  const output = cliOptions.output ?? defaultOutput;
  const env = cliOptions.env ?? process.env;
  const cwd = cliOptions.cwd ?? process.cwd();
  const print = (line: string): void => output.stdout(`${line}\n`);

  const program: Command = new Command();

  program
    .name('scratchpay')
    .description('Build placeholder mint/swap/stake payloads and keep a local plan log')
    .version('0.1.0')
    .configureOutput({
      writeOut: (text) => output.stdout(text),
      writeErr: (text) => output.stderr(text),
    })
    .option('--op <operation>', `Operation type (${OPERATION_KINDS.join('|')})`)
    .option('--target <target>', 'Target account or contract')
    .option('--amount <amount>', 'Amount for the payload', '0')
    .option('--note <note>', 'Optional narrative', '')
    .option('--network <name>', 'Tag the payload with a named network profile')
    .addOption(
      new Option('--meta <pairs...>', 'Extra key=value metadata for the payload').argParser(collectMetadata)
    )
    .option('--list-records', 'List recorded payloads')
    .option('--summary', 'Show payload summary')
    .option('--list-networks', 'List configured network profiles')
    .option('--plan <text>', 'Capture a short plan note')
    .addOption(new Option('--urgency <level>', 'Triage level for the plan').choices(URGENCY_LEVELS))
    .option('--tags <tags...>', 'Tags to attach to the plan note')
    .option('--hints <hints...>', 'Possible next steps; prints one suggestion')
    .option('--describe', 'Describe where records and plans are kept')
    .option('--data-dir <dir>', 'Directory holding records/, plans/ and data/ (default: $SCRATCHPAY_DIR or cwd)')
    .option('--config <file>', 'Network profile file (default: <data-dir>/data/networks.json)')
    .option('--verbose', 'Log file activity to stderr')
    .action((options: ProgramOptions) => {
      if (options.verbose) {
        setLogLevel('debug');
      }

      const actions = resolveActions(options);
      if (actions.length === 0) {
        program.help();
      }
      if (actions.length > 1) {
        const flags = actions.map((action) => ACTION_FLAGS[action]).join(', ');
        program.error(`✗ Error: choose a single action, got ${flags}`, {
          exitCode: USAGE_EXIT_CODE,
          code: 'scratchpay.usage',
        });
      }

      const action = actions[0];
      if (action !== undefined) {
        const allowed = ACTION_SCOPED_FLAGS[action];
        const stray = SCOPED_FLAGS.filter(
          (key) => program.getOptionValueSource(key) === 'cli' && !allowed.includes(key)
        );
        if (stray.length > 0) {
          const flags = stray.map((key) => `--${key}`).join(', ');
          program.error(`✗ Error: ${flags} cannot be used with ${ACTION_FLAGS[action]}`, {
            exitCode: USAGE_EXIT_CODE,
            code: 'scratchpay.usage',
          });
        }
      }

      const scratchpad = new Scratchpad({
        dataDir: options.dataDir ?? env.SCRATCHPAY_DIR ?? cwd,
        networksFile: options.config,
      });

      try {
        runAction(action, options, scratchpad, print, program);
      } catch (error) {
        if (error instanceof ScratchpayError) {
          program.error(`✗ Error: ${error.message}`, { exitCode: 1, code: `scratchpay.${error.code}` });
        }
        throw error;
      }
    });

  return program;
}

function runAction(
  action: CliAction | undefined,
  options: ProgramOptions,
  scratchpad: Scratchpad,
  print: (line: string) => void,
  program: Command
): void {
  switch (action) {
    case 'payload': {
      if (options.op === undefined || options.target === undefined) {
        program.error('✗ Error: --target is required with --op', {
          exitCode: USAGE_EXIT_CODE,
          code: 'scratchpay.usage',
        });
      }
      const { record, path } = scratchpad.recordPayload(
        {
          operation: options.op,
          target: options.target,
          amount: options.amount,
          note: options.note,
          network: options.network,
          metadata: options.meta,
        },
        options.plan ?? null
      );
      print(`✓ Payload recorded at ${path}`);
      print(`  Id: ${record.id}`);
      print(`  Operation: ${record.operation} ${record.amount} -> ${record.target}`);
      if (record.network) {
        print(`  Network: ${record.network}`);
      }
      return;
    }

    case 'plan': {
      const { entry, path } = scratchpad.plans.append({
        text: options.plan ?? '',
        urgency: options.urgency,
        tags: options.tags,
      });
      print(`✓ Plan logged: ${path}`);
      if (entry.urgency) print(`  Urgency: ${entry.urgency}`);
      if (entry.tags.length > 0) print(`  Tags: ${entry.tags.join(', ')}`);
      return;
    }

    case 'list-records': {
      const files = scratchpad.records.listFiles();
      if (files.length === 0) {
        print('No payloads recorded yet.');
        return;
      }
      print('Saved payloads:');
      for (const file of files) {
        print(`- ${file}`);
      }
      return;
    }

    case 'summary': {
      const summary = scratchpad.records.summarize();
      print(`Payload summary: ${summary.count} entries, ${summary.total_amount} total amount.`);
      for (const kind of OPERATION_KINDS) {
        print(`  ${kind}: ${summary.ops[kind]}`);
      }
      return;
    }

    case 'list-networks': {
      const profiles = scratchpad.networks().list();
      if (profiles.length === 0) {
        print('No network profiles found.');
        return;
      }
      print('Available profiles:');
      for (const profile of profiles) {
        const description = profile.description ? `: ${profile.description}` : '';
        print(`- ${profile.name}${description} (${profile.rpc})`);
      }
      return;
    }

    case 'describe':
      print(scratchpad.describe(options.network));
      return;

    case 'hints':
      print(`Hint suggestion: ${scratchpad.plans.suggestNext(options.hints ?? [])}`);
      return;

    case undefined:
      return;
  }
}
