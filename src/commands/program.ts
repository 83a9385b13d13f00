import type { DriftlessContext } from '@/context';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { createApplication, type CreateApplicationOptions } from './create-application';
import { deleteApplication } from './delete-application';
import { EXIT, type CommandResult, type ExitCode } from './exit-codes';
import { getStatus } from './get-status';
import { sync, type SyncCommandOptions } from './sync';
import { triggerPipeline, type TriggerPipelineOptions } from './trigger-pipeline';

export type CliIO = {
  /** Built on first use, so `--help` and argument errors never touch the cluster. */
  context: () => DriftlessContext;
  out: (text: string) => void;
  err: (text: string) => void;
};

const parseMilliseconds = (value: string): number => {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError('Expected a positive number of milliseconds.');
  }
  return ms;
};

const parseFormat = (value: string): 'human' | 'json' => {
  if (value !== 'human' && value !== 'json') {
    throw new InvalidArgumentError('Expected human or json.');
  }
  return value;
};

/**
 * Create the control-surface program. Every action records its exit code instead of exiting,
 * so one process can run it more than once.
 */
export function createProgram(io: CliIO): { program: Command; exitCode: () => ExitCode } {
  let exitCode: ExitCode = EXIT.SUCCESS;
  let context: DriftlessContext | undefined;
  const getContext = () => (context ??= io.context());

  const report = (result: CommandResult) => {
    for (const line of result.lines ?? []) io.out(`${line}\n`);
    if (!result.ok) {
      io.err(`${result.error}\n`);
      exitCode = result.exitCode;
    }
  };

  const program = new Command();
  program
    .name('driftless')
    .description('Control surface of the driftless continuous-delivery controller')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({ writeOut: io.out, writeErr: io.err });

  program
    .command('create-application')
    .description('Register an Application')
    .argument('<name>', 'Application name (DNS label)')
    .requiredOption('--repo <url>', 'Manifest repository URL')
    .option('--path <path>', 'Path inside the repository', '.')
    .option('--revision <revision>', 'Branch, tag or commit', 'HEAD')
    .requiredOption('--dest-namespace <namespace>', 'Namespace the objects are applied to')
    .option('--automated', 'Sync on every new revision')
    .option('--self-heal', 'Revert out-of-band changes (automated only)')
    .option('--prune', 'Delete owned objects that left the repository')
    .option('--image-promotion <image>', 'Record digests of pipeline runs for this image')
    .action(async (name: string, opts: CreateApplicationOptions) => {
      report(await createApplication(getContext(), name, opts));
    });

  program
    .command('sync')
    .description('Render and reconcile an Application now')
    .argument('<app>', 'Application name')
    .option('--prune', 'Prune orphans for this pass')
    .option('--dry-run', 'Print the planned changes without writing')
    .action(async (app: string, opts: SyncCommandOptions) => {
      report(await sync(getContext(), app, opts));
    });

  program
    .command('get-status')
    .description('Show the last known status of an Application')
    .argument('<app>', 'Application name')
    .option('--format <format>', 'Output format: human|json', parseFormat, 'human')
    .action(async (app: string, opts: { format: 'human' | 'json' }) => {
      report(await getStatus(getContext(), app, opts));
    });

  program
    .command('delete-application')
    .description('Remove an Application')
    .argument('<app>', 'Application name')
    .option('--cascade', 'Also delete the objects it owns')
    .action(async (app: string, opts: { cascade?: boolean }) => {
      report(await deleteApplication(getContext(), app, opts));
    });

  program
    .command('trigger-pipeline')
    .description('Submit a build-and-push pipeline run')
    .argument('<sourceRef>', 'Source revision to build')
    .argument('<imageTag>', 'Image reference to push, e.g. demo-app:latest')
    .option('--app <name>', 'Application the image belongs to')
    .option('--wait <ms>', 'Wait up to this long for a terminal outcome', parseMilliseconds)
    .action(async (sourceRef: string, imageTag: string, opts: TriggerPipelineOptions) => {
      report(await triggerPipeline(getContext(), sourceRef, imageTag, opts));
    });

  return { program, exitCode: () => exitCode };
}

/** Runs one command line (without the node and script arguments) and returns its exit code. */
export async function runCli(argv: string[], io: CliIO): Promise<ExitCode> {
  const { program, exitCode } = createProgram(io);
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT.SUCCESS : EXIT.USER_ERROR;
    }
    throw err;
  }
  return exitCode();
}
