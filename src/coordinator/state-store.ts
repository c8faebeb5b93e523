import { Mutex } from 'async-mutex';
import { randomUUID } from 'crypto';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { lock } from 'proper-lockfile';
import type { Logger } from '../logging';
import { silentLogger } from '../logging';
import { createEmptyLedger, parseLedger, serializeLedger } from './ledger';
import type { LedgerState } from './types';

export interface LedgerStore {
  read(): Promise<LedgerState>;
  /**
   * Run `mutate` on a private copy of the ledger under exclusive access and
   * persist the copy only if it returns without throwing.
   */
  transact<T>(mutate: (state: LedgerState) => T): Promise<T>;
  /** Move an unreadable ledger aside and start a fresh one; returns where the old one went. */
  quarantine(): Promise<string | null>;
}

export interface FileLedgerStoreOptions {
  statePath: string;
  initialWipLimit: number;
  lockStaleMs?: number;
  lockRetries?: number;
  now?: () => number;
  log?: Logger;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileLedgerStore implements LedgerStore {
  private statePath: string;
  private initialWipLimit: number;
  private lockStaleMs: number;
  private lockRetries: number;
  private now: () => number;
  private log: Logger;
  private mutex = new Mutex();

  constructor(options: FileLedgerStoreOptions) {
    this.statePath = options.statePath;
    this.initialWipLimit = options.initialWipLimit;
    this.lockStaleMs = options.lockStaleMs ?? 30000;
    this.lockRetries = options.lockRetries ?? 50;
    this.now = options.now ?? Date.now;
    this.log = options.log ?? silentLogger;
  }

  get path(): string {
    return this.statePath;
  }

  /** Lock-free read; writers only ever rename complete files into place. */
  async read(): Promise<LedgerState> {
    return this.load();
  }

  async transact<T>(mutate: (state: LedgerState) => T): Promise<T> {
    return this.mutex.runExclusive(() =>
      this.withFileLock(async () => {
        const draft = await this.load();
        const result = mutate(draft);
        draft.updatedAt = this.now();
        await this.writeAtomic(serializeLedger(draft));
        return result;
      }),
    );
  }

  async quarantine(): Promise<string | null> {
    return this.mutex.runExclusive(() =>
      this.withFileLock(async () => {
        const target = `${this.statePath}.corrupt-${this.now()}`;
        try {
          await rename(this.statePath, target);
        } catch (error) {
          if (isMissing(error)) return null;
          throw error;
        }
        this.log.warn(`Moved unreadable ledger to ${target}`);
        await this.writeAtomic(serializeLedger(createEmptyLedger(this.initialWipLimit, this.now())));
        return target;
      }),
    );
  }

  private async load(): Promise<LedgerState> {
    let raw: string;
    try {
      raw = await readFile(this.statePath, 'utf-8');
    } catch (error) {
      if (isMissing(error)) {
        return createEmptyLedger(this.initialWipLimit, this.now());
      }
      throw error;
    }
    return parseLedger(raw, this.statePath);
  }

  private async withFileLock<T>(fn: () => Promise<T>): Promise<T> {
    await mkdir(dirname(this.statePath), { recursive: true, mode: 0o700 });
    const release = await lock(this.statePath, {
      realpath: false,
      stale: this.lockStaleMs,
      retries: { retries: this.lockRetries, minTimeout: 50, maxTimeout: 500 },
      onCompromised: (error) => {
        this.log.error(`Ledger lock compromised: ${error.message}`);
      },
    });
    try {
      return await fn();
    } finally {
      await release();
    }
  }

  private async writeAtomic(content: string): Promise<void> {
    const tmp = `${this.statePath}.${randomUUID()}.tmp`;
    await writeFile(tmp, content, { encoding: 'utf-8', mode: 0o600 });
    await rename(tmp, this.statePath);
  }
}

/** In-process store with the same transaction semantics; used by tests and dry runs. */
export class MemoryLedgerStore implements LedgerStore {
  private mutex = new Mutex();
  private state: LedgerState;

  constructor(initial: LedgerState) {
    this.state = structuredClone(initial);
  }

  async read(): Promise<LedgerState> {
    return structuredClone(this.state);
  }

  async transact<T>(mutate: (state: LedgerState) => T): Promise<T> {
    return this.mutex.runExclusive(() => {
      const draft = structuredClone(this.state);
      const result = mutate(draft);
      this.state = draft;
      return structuredClone(result);
    });
  }

  async quarantine(): Promise<string | null> {
    return null;
  }
}
