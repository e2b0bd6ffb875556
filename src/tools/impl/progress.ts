import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { isErrno, writeFileAtomically } from '../../utils/fs.js';

const entrySchema = z.object({
  topic: z.string(),
  correct: z.boolean(),
  questionId: z.string().optional(),
  at: z.number(),
});
export type ProgressEntry = z.infer<typeof entrySchema>;

export interface TopicProgress {
  topic: string;
  total: number;
  correct: number;
  accuracy: number;
  status: 'excellent' | 'good' | 'needs_work';
}

/** Per-user answer log, one JSON array per user under `<dataDir>/progress`. */
export class ProgressFile {
  // Appends per user are chained; the executor may run two record calls at once.
  private writes = new Map<string, Promise<number>>();

  constructor(private dataDir: string) {}

  private path(userId: string) {
    return join(this.dataDir, 'progress', `${encodeURIComponent(userId)}.json`);
  }

  async read(userId: string): Promise<ProgressEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.path(userId), 'utf-8');
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return [];
      throw err;
    }
    return z.array(entrySchema).parse(JSON.parse(raw));
  }

  // Resolves to the number of entries after the write.
  append(userId: string, entry: ProgressEntry): Promise<number> {
    const previous = this.writes.get(userId) ?? Promise.resolve(0);
    const next = previous
      .catch(() => 0)
      .then(async () => {
        const entries = await this.read(userId);
        entries.push(entry);
        await writeFileAtomically(this.path(userId), JSON.stringify(entries, null, 2));
        return entries.length;
      });
    this.writes.set(userId, next);
    return next;
  }
}

export function summarizeProgress(entries: ProgressEntry[]): TopicProgress[] {
  const byTopic = new Map<string, { total: number; correct: number }>();
  for (const e of entries) {
    const t = byTopic.get(e.topic) ?? { total: 0, correct: 0 };
    t.total++;
    if (e.correct) t.correct++;
    byTopic.set(e.topic, t);
  }
  return Array.from(byTopic.entries())
    .map(([topic, { total, correct }]) => {
      const accuracy = Math.round((correct / total) * 1000) / 10;
      const status: TopicProgress['status'] = accuracy >= 80 ? 'excellent' : accuracy >= 60 ? 'good' : 'needs_work';
      return { topic, total, correct, accuracy, status };
    })
    .sort((a, b) => a.accuracy - b.accuracy);
}
