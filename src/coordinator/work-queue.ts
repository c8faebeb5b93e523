import { UnknownWorkError, ValidationError } from './errors';
import { allItems } from './ledger';
import type { LedgerState, WorkItem, WorkStatus } from './types';

export type WorkDraft = Pick<
  WorkItem,
  | 'description'
  | 'priority'
  | 'complexity'
  | 'dependencies'
  | 'timing'
  | 'deferred'
  | 'tier'
  | 'estimatedQuota'
  | 'estimatedDuration'
  | 'scheduledFor'
> & { id?: string };

function generateId(now: number): string {
  return `work_${now}_${Math.random().toString(36).slice(2, 8)}`;
}

function checkRange(field: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(`${field} must be an integer between ${min} and ${max}, got ${value}`);
  }
}

function checkEstimate(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative number, got ${value}`);
  }
}

/**
 * View over a ledger draft. Reads and moves items between the status buckets;
 * every mutation happens on the state handed in.
 */
export class WorkQueue {
  constructor(private readonly state: LedgerState) {}

  get(id: string): WorkItem | null {
    return allItems(this.state).find((item) => item.id === id) ?? null;
  }

  require(id: string): WorkItem {
    const item = this.get(id);
    if (!item) throw new UnknownWorkError(id);
    return item;
  }

  getAll(): WorkItem[] {
    return allItems(this.state);
  }

  getByStatus(status: WorkStatus): WorkItem[] {
    switch (status) {
      case 'queued':
        return this.state.queued;
      case 'active':
        return this.state.active;
      case 'completed':
        return this.state.completed;
      case 'permanently_failed':
        return this.state.failed;
      case 'failed':
        return [];
    }
  }

  get activeCount(): number {
    return this.state.active.length;
  }

  get wipLimit(): number {
    return this.state.wipLimit;
  }

  completedIds(): Set<string> {
    return new Set(this.state.completed.map((item) => item.id));
  }

  blockedBy(item: WorkItem, completed: Set<string> = this.completedIds()): string[] {
    return item.dependencies.filter((dep) => !completed.has(dep));
  }

  isEligible(item: WorkItem, now: number, completed: Set<string> = this.completedIds()): boolean {
    if (item.status !== 'queued') return false;
    if (item.notBefore !== null && item.notBefore > now) return false;
    return this.blockedBy(item, completed).length === 0;
  }

  getEligible(now: number): WorkItem[] {
    const completed = this.completedIds();
    return this.state.queued.filter((item) => this.isEligible(item, now, completed));
  }

  /** Number of queued items waiting on this one. */
  unblockCount(id: string): number {
    return this.state.queued.filter((item) => item.dependencies.includes(id)).length;
  }

  add(draft: WorkDraft, now: number): WorkItem {
    const [item] = this.addMany([draft], now);
    return item;
  }

  /**
   * Insert drafts atomically. Drafts may depend on each other; nothing is
   * inserted unless every draft validates and the batch is acyclic.
   */
  addMany(drafts: WorkDraft[], now: number): WorkItem[] {
    const known = new Set(allItems(this.state).map((item) => item.id));
    const ids: string[] = [];

    for (const draft of drafts) {
      let id = draft.id;
      if (id === undefined) {
        do {
          id = generateId(now);
        } while (known.has(id) || ids.includes(id));
      } else if (id.trim() === '') {
        throw new ValidationError('Work id must not be empty');
      } else if (known.has(id) || ids.includes(id)) {
        throw new ValidationError(`Work id ${id} is already in use`);
      }
      ids.push(id);
    }

    const batch = new Set(ids);
    drafts.forEach((draft, index) => {
      const id = ids[index];
      checkRange('priority', draft.priority, 1, 10);
      checkRange('complexity', draft.complexity, 1, 10);
      checkEstimate('estimatedQuota', draft.estimatedQuota);
      checkEstimate('estimatedDuration', draft.estimatedDuration);

      const deps = new Set<string>();
      for (const dep of draft.dependencies) {
        if (dep === id) {
          throw new ValidationError(`Work ${id} cannot depend on itself`);
        }
        if (!known.has(dep) && !batch.has(dep)) {
          throw new ValidationError(`Work ${id} depends on unknown id ${dep}`);
        }
        if (deps.has(dep)) {
          throw new ValidationError(`Work ${id} lists dependency ${dep} twice`);
        }
        deps.add(dep);
      }
    });

    const cycle = findCycle(
      new Map(drafts.map((draft, index) => [ids[index], draft.dependencies.filter((dep) => batch.has(dep))])),
    );
    if (cycle) {
      throw new ValidationError(`Dependency cycle: ${cycle.join(' -> ')}`);
    }

    const inserted = drafts.map((draft, index): WorkItem => ({
      id: ids[index],
      description: draft.description,
      priority: draft.priority,
      complexity: draft.complexity,
      dependencies: [...draft.dependencies],
      status: 'queued',
      timing: draft.timing,
      deferred: draft.deferred,
      tier: draft.tier,
      estimatedQuota: draft.estimatedQuota,
      estimatedDuration: draft.estimatedDuration,
      retryCount: 0,
      createdAt: now,
      enqueuedAt: now,
      seq: this.state.nextSeq++,
      startedAt: null,
      scheduledFor: draft.scheduledFor,
      notBefore: null,
      completedAt: null,
      resultLocation: null,
      agent: null,
      lastError: null,
    }));

    this.state.queued.push(...inserted);
    return inserted;
  }

  markActive(item: WorkItem, now: number, agent?: string): void {
    this.detach(item);
    item.status = 'active';
    item.startedAt = now;
    item.notBefore = null;
    if (agent) item.agent = agent;
    this.state.active.push(item);
  }

  markCompleted(item: WorkItem, now: number, resultLocation: string | null): void {
    this.detach(item);
    item.status = 'completed';
    item.completedAt = now;
    if (resultLocation !== null) item.resultLocation = resultLocation;
    this.state.completed.push(item);
  }

  /** Back to the tail of the queue; FIFO position restarts at `now`. */
  requeue(item: WorkItem, now: number, reason: string, notBefore: number | null): void {
    this.detach(item);
    item.status = 'queued';
    item.startedAt = null;
    item.lastError = reason;
    item.enqueuedAt = now;
    item.seq = this.state.nextSeq++;
    item.notBefore = notBefore;
    this.state.queued.push(item);
  }

  markPermanentlyFailed(item: WorkItem, now: number, reason: string): void {
    this.detach(item);
    item.status = 'permanently_failed';
    item.lastError = reason;
    item.completedAt = now;
    this.state.failed.push(item);
  }

  private detach(item: WorkItem): void {
    for (const bucket of ['queued', 'active', 'completed', 'failed'] as const) {
      const index = this.state[bucket].indexOf(item);
      if (index !== -1) {
        this.state[bucket].splice(index, 1);
        return;
      }
    }
  }
}

function findCycle(graph: Map<string, string[]>): string[] | null {
  const visiting = new Set<string>();
  const done = new Set<string>();
  const path: string[] = [];

  const visit = (id: string): string[] | null => {
    if (done.has(id)) return null;
    if (visiting.has(id)) {
      return [...path.slice(path.indexOf(id)), id];
    }
    visiting.add(id);
    path.push(id);
    for (const dep of graph.get(id) ?? []) {
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    path.pop();
    visiting.delete(id);
    done.add(id);
    return null;
  };

  for (const id of graph.keys()) {
    const cycle = visit(id);
    if (cycle) return cycle;
  }
  return null;
}
