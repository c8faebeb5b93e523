#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import { formatISO } from 'date-fns';
import { loadConfig } from './config/loader';
import type { WorkCoordinator } from './coordinator/coordinator';
import { CommandWorker } from './coordinator/command-worker';
import { OvernightDaemon } from './coordinator/daemon';
import type { WorkRunner } from './coordinator/deferred-executor';
import { DeferredExecutor } from './coordinator/deferred-executor';
import { isCoordinatorError } from './coordinator/errors';
import type { StatusSummary, WorkInput, WorkTiming } from './coordinator/types';
import { createCoordinator } from './index';
import { createLogger } from './logging';

export interface CliDeps {
  coordinator: () => WorkCoordinator;
  runner?: (coordinator: WorkCoordinator) => WorkRunner;
  out?: (line: string) => void;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function time(ms: number | null): string {
  return ms === null ? '-' : formatISO(ms);
}

export function formatStatus(status: StatusSummary): string[] {
  const lines = [
    `WIP ${status.counts.active}/${status.wipLimit} | queued ${status.counts.queued} | completed ${status.counts.completed} | failed ${status.counts.permanentlyFailed}`,
    `Active hours: ${status.inActiveHours ? 'yes' : 'no'}`,
  ];
  if (status.active.length > 0) {
    lines.push('', 'Active:');
    for (const item of status.active) {
      lines.push(`  ${item.id}  ${item.elapsedMinutes}m  ${item.description}`);
    }
  }
  if (status.queued.length > 0) {
    lines.push('', 'Queued:');
    for (const item of status.queued) {
      const flags = [item.timing, item.deferred ? 'deferred' : null, item.eligible ? null : `blocked by ${item.blockedBy.join(', ') || 'backoff'}`]
        .filter((flag) => flag !== null)
        .join(', ');
      lines.push(`  ${item.id}  score ${item.score}  (${flags})  ${item.description}`);
    }
  }
  lines.push('', 'Quota:');
  for (const tier of status.quota) {
    const limit = tier.limit === null ? 'unlimited' : `${tier.used}/${tier.limit} (${tier.percent}%), ${tier.usable} usable`;
    lines.push(`  ${tier.tier}: ${limit}`);
  }
  if (status.lastOvernightRun) {
    const run = status.lastOvernightRun;
    lines.push(
      '',
      `Last overnight run ${run.runId}: ${run.completed.length} completed, ${run.retried.length} retried, ` +
        `${run.permanentlyFailed.length} failed, ${run.skipped.length} skipped, ${run.requeuedAtClose.length} requeued at close`,
    );
  }
  if (status.warnings.length > 0) {
    lines.push('', 'Warnings:');
    for (const warning of status.warnings) {
      lines.push(`  ! ${warning}`);
    }
  }
  return lines;
}

export function createProgram(deps: CliDeps): Command {
  const out = deps.out ?? ((line: string) => console.log(line));
  const print = (value: unknown) => out(JSON.stringify(value, null, 2));
  const runnerFor = deps.runner ?? ((coordinator: WorkCoordinator) => new CommandWorker(coordinator.config.worker));

  const program = new Command();
  program.name('nightshift').description('Work coordination with an overnight execution window');

  program
    .command('add')
    .description('Queue a work item')
    .argument('<description...>', 'What the work is')
    .option('--id <id>', 'Explicit work id')
    .option('-p, --priority <n>', 'Priority 1-10', parseInteger)
    .option('-c, --complexity <n>', 'Complexity 1-10', parseInteger)
    .option('-d, --depends <ids>', 'Comma-separated ids this work waits on', parseList)
    .addOption(new Option('-t, --timing <timing>', 'Override the timing classification').choices(['sync', 'async', 'flexible']))
    .option('--tier <tier>', 'Budget tier')
    .option('--quota <units>', 'Estimated quota units', parseNumber)
    .option('--duration <minutes>', 'Estimated duration in minutes', parseNumber)
    .option('--json', 'Output JSON', false)
    .action(async (words: string[], opts: {
      id?: string;
      priority?: number;
      complexity?: number;
      depends?: string[];
      timing?: WorkTiming;
      tier?: string;
      quota?: number;
      duration?: number;
      json: boolean;
    }) => {
      const input: WorkInput = {
        id: opts.id,
        description: words.join(' '),
        priority: opts.priority,
        complexity: opts.complexity,
        dependencies: opts.depends,
        timing: opts.timing,
        tier: opts.tier,
        estimatedQuota: opts.quota,
        estimatedDuration: opts.duration,
      };
      const { item, scheduled } = await deps.coordinator().addWork(input);
      if (opts.json) {
        print({ item, scheduled: scheduled.map((entry) => entry.id) });
        return;
      }
      out(`Queued ${item.id} (${item.timing}${item.deferred ? `, deferred to ${time(item.scheduledFor)}` : ''})`);
      for (const entry of scheduled) {
        out(`Started ${entry.id}`);
      }
    });

  program
    .command('next')
    .description('Admit eligible work into free WIP slots')
    .action(async () => {
      const result = await deps.coordinator().scheduleNext();
      if (result.admitted.length === 0) {
        out(`Nothing admitted (${result.activeCount}/${result.wipLimit} active)`);
      }
      for (const item of result.admitted) {
        out(`Started ${item.id}: ${item.description}`);
      }
    });

  program
    .command('complete')
    .description('Mark active work as completed')
    .argument('<id>')
    .option('--output <text>', 'Result to store with the item')
    .option('--agent <name>', 'Who did the work')
    .option('--quota-used <units>', 'Actual quota consumed', parseNumber)
    .action(async (id: string, opts: { output?: string; agent?: string; quotaUsed?: number }) => {
      const outcome = await deps.coordinator().completeWork(id, opts);
      out(outcome.alreadyCompleted ? `${id} was already completed` : `Completed ${id}`);
      for (const entry of outcome.scheduled) {
        out(`Started ${entry.id}`);
      }
    });

  program
    .command('fail')
    .description('Report a failed attempt of active work')
    .argument('<id>')
    .argument('<reason...>')
    .action(async (id: string, reason: string[]) => {
      const outcome = await deps.coordinator().failWork(id, reason.join(' '));
      if (outcome.kind === 'retry') {
        out(`Requeued ${id} (attempt ${outcome.retryCount})`);
      } else {
        out(`${id} failed permanently: ${outcome.reason}`);
      }
      for (const entry of outcome.scheduled) {
        out(`Started ${entry.id}`);
      }
    });

  program
    .command('stalled')
    .description('List active work running past the stall threshold')
    .option('--threshold <minutes>', 'Stall threshold in minutes', parseNumber)
    .action(async (opts: { threshold?: number }) => {
      const stalled = await deps.coordinator().findStalled(opts.threshold);
      if (stalled.length === 0) {
        out('No stalled work');
      }
      for (const report of stalled) {
        out(`${report.id}  ${report.elapsedMinutes}m  ${report.description}`);
      }
    });

  program
    .command('adapt')
    .description('Recompute the WIP limit from recent execution metrics')
    .action(async () => {
      const decision = await deps.coordinator().adaptConcurrency();
      out(`${decision.mode}: WIP ${decision.previousWipLimit} -> ${decision.wipLimit}`);
    });

  program
    .command('wip')
    .description('Set the WIP limit')
    .argument('<limit>', 'New limit', parseInteger)
    .action(async (limit: number) => {
      const applied = await deps.coordinator().setWipLimit(limit);
      out(`WIP limit is ${applied}`);
    });

  program
    .command('usage')
    .description('Record quota consumed outside the scheduler')
    .argument('<tier>')
    .argument('<amount>', 'Units consumed', parseNumber)
    .action(async (tier: string, amount: number) => {
      const used = await deps.coordinator().recordUsage(tier, amount);
      out(`${tier}: ${used} used this period`);
    });

  program
    .command('status')
    .description('Show queue, quota and overnight state')
    .option('--json', 'Output JSON', false)
    .action(async (opts: { json: boolean }) => {
      const status = await deps.coordinator().statusSummary();
      if (opts.json) {
        print(status);
        return;
      }
      for (const line of formatStatus(status)) {
        out(line);
      }
    });

  program
    .command('forecast')
    .description('Show what the next overnight window can fit')
    .option('--json', 'Output JSON', false)
    .action(async (opts: { json: boolean }) => {
      const report = await deps.coordinator().forecast();
      if (opts.json) {
        print(report);
        return;
      }
      out(`Window ${time(report.windowStart)} - ${time(report.windowEnd)}`);
      for (const entry of report.fits) {
        out(`  fits      ${entry.id} (${entry.tier}, ${entry.estimatedQuota})`);
      }
      for (const entry of report.deferred) {
        out(`  deferred  ${entry.id} (${entry.tier}, ${entry.estimatedQuota})`);
      }
    });

  program
    .command('classify')
    .description('Show how a description would be classified')
    .argument('<description...>')
    .action((words: string[]) => {
      const report = deps.coordinator().classify(words.join(' '));
      out(`${report.timing} (rule: ${report.rule}, tier: ${report.tier})`);
    });

  program
    .command('show')
    .description('Print one work item')
    .argument('<id>')
    .action(async (id: string) => {
      print(await deps.coordinator().getWork(id));
    });

  program
    .command('reset')
    .description('Move an unreadable ledger aside and start fresh')
    .action(async () => {
      const moved = await deps.coordinator().reset();
      out(moved ? `Previous ledger kept at ${moved}` : 'No ledger to reset');
    });

  program
    .command('run')
    .description('Run deferred work now')
    .option('--force', 'Run even outside the execution window', false)
    .action(async (opts: { force: boolean }) => {
      const coordinator = deps.coordinator();
      const executor = new DeferredExecutor(coordinator, runnerFor(coordinator));
      const summary = await executor.run({ force: opts.force });
      out(
        `Run ${summary.runId}: ${summary.completed.length} completed, ${summary.retried.length} retried, ` +
          `${summary.permanentlyFailed.length} failed, ${summary.skipped.length} skipped`,
      );
    });

  program
    .command('daemon')
    .description('Stay resident and run deferred work every night')
    .action(async () => {
      const coordinator = deps.coordinator();
      const daemon = new OvernightDaemon(coordinator, new DeferredExecutor(coordinator, runnerFor(coordinator)));
      const log = createLogger('Daemon');

      const shutdown = async (signal: string) => {
        log.info(`Received ${signal}`);
        await daemon.stop();
        process.exit(0);
      };
      process.on('SIGTERM', () => {
        void shutdown('SIGTERM');
      });
      process.on('SIGINT', () => {
        void shutdown('SIGINT');
      });

      log.info(`Starting, PID ${process.pid}`);
      daemon.start();
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  let coordinator: WorkCoordinator | null = null;
  const program = createProgram({
    coordinator: () => {
      coordinator ??= createCoordinator(loadConfig());
      return coordinator;
    },
  });
  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isCoordinatorError(error)) {
      console.error(`${error.name}: ${error.message}`);
    } else {
      console.error(error);
    }
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
