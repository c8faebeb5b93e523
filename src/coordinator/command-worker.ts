import { execFile } from 'child_process';
import { promisify } from 'util';
import type { WorkerConfig } from '../config/schema';
import { ConfigError } from './errors';
import type { RunnerResult, WorkRunner } from './deferred-executor';
import type { WorkItem } from './types';

const execFileAsync = promisify(execFile);

/**
 * Runs each item as `<command...> <description>` and keeps stdout as the
 * result. A non-zero exit or a timeout rejects, which counts as a failed attempt.
 */
export class CommandWorker implements WorkRunner {
  private program: string;
  private args: string[];
  private timeoutMs: number;

  constructor(config: WorkerConfig) {
    const [program, ...args] = config.command;
    if (!program) {
      throw new ConfigError('worker.command must name a program');
    }
    this.program = program;
    this.args = args;
    this.timeoutMs = config.timeoutMinutes * 60 * 1000;
  }

  async run(item: WorkItem): Promise<RunnerResult> {
    const { stdout } = await execFileAsync(this.program, [...this.args, item.description], {
      timeout: this.timeoutMs,
      maxBuffer: 10 * 1024 * 1024,
      env: { ...process.env, NIGHTSHIFT_WORK_ID: item.id, NIGHTSHIFT_TIER: item.tier },
    });
    return { output: stdout, agent: this.program };
  }
}
