import { randomUUID } from 'crypto';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { OvernightRunSummary } from './types';

const WorkResultSchema = z.object({
  id: z.string(),
  completedAt: z.number(),
  agent: z.string().nullable(),
  output: z.unknown(),
});

export type WorkResult = z.infer<typeof WorkResultSchema>;

/** One file name per id: percent-encoding keeps path separators out and never maps two ids together. */
function fileName(id: string): string {
  return `${encodeURIComponent(id)}.json`;
}

async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  const tmp = `${path}.${randomUUID()}.tmp`;
  await writeFile(tmp, JSON.stringify(value, null, 2), { encoding: 'utf-8', mode: 0o600 });
  await rename(tmp, path);
}

/**
 * Result artifacts on disk: one JSON file per completed item, plus a report
 * per overnight run. The ledger only keeps the returned paths.
 */
export class ResultStore {
  constructor(private readonly dir: string) {}

  pathFor(id: string): string {
    return join(this.dir, fileName(id));
  }

  async write(result: WorkResult): Promise<string> {
    await mkdir(this.dir, { recursive: true, mode: 0o700 });
    const path = this.pathFor(result.id);
    await writeJsonAtomic(path, result);
    return path;
  }

  async read(location: string): Promise<WorkResult> {
    return WorkResultSchema.parse(JSON.parse(await readFile(location, 'utf-8')));
  }

  async writeRunReport(summary: OvernightRunSummary, details: unknown): Promise<string> {
    const runsDir = join(this.dir, 'runs');
    await mkdir(runsDir, { recursive: true, mode: 0o700 });
    const path = join(runsDir, fileName(summary.runId));
    await writeJsonAtomic(path, { ...summary, reportLocation: path, details });
    return path;
  }
}
