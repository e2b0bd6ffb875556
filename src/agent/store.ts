import { existsSync } from 'node:fs';
import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { isErrno, writeFileAtomically } from '../utils/fs.js';
import { CheckpointCorrupt, RunAlreadyResolved, UnknownRun } from './errors.js';
import { RunState, runStateSchema } from './types.js';

/**
 * Durable copies of suspended runs, keyed by run id.
 *
 * Only the orchestrator writes here. `claim` hands a checkpoint to exactly one
 * resolver; a deleted run is remembered so a late decision for it gets
 * `RunAlreadyResolved` rather than `UnknownRun`.
 */
export interface CheckpointStore {
  put(runId: string, state: RunState): Promise<void>;
  get(runId: string): Promise<RunState | undefined>;
  delete(runId: string): Promise<void>;
  // A claimed checkpoint that cannot be decoded is retired as resolved.
  claim(runId: string): Promise<RunState>;
  // Suspended runs that nobody has claimed.
  list(): Promise<RunState[]>;
}

function decode(runId: string, raw: string): RunState {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new CheckpointCorrupt(runId, err instanceof Error ? err.message : 'invalid JSON');
  }
  const parsed = runStateSchema.safeParse(data);
  if (!parsed.success) throw new CheckpointCorrupt(runId, parsed.error.issues[0]?.message ?? 'schema mismatch');
  return parsed.data;
}

export class InMemoryCheckpointStore implements CheckpointStore {
  // Kept serialized so callers never share references with the stored copy.
  private pending = new Map<string, string>();
  private claimed = new Map<string, string>();
  private resolved = new Set<string>();

  async put(runId: string, state: RunState): Promise<void> {
    this.claimed.delete(runId);
    this.pending.set(runId, JSON.stringify(state));
  }

  async get(runId: string): Promise<RunState | undefined> {
    const raw = this.pending.get(runId) ?? this.claimed.get(runId);
    return raw === undefined ? undefined : decode(runId, raw);
  }

  async delete(runId: string): Promise<void> {
    this.pending.delete(runId);
    this.claimed.delete(runId);
    this.resolved.add(runId);
  }

  async claim(runId: string): Promise<RunState> {
    const raw = this.pending.get(runId);
    if (raw === undefined) {
      if (this.claimed.has(runId) || this.resolved.has(runId)) throw new RunAlreadyResolved(runId);
      throw new UnknownRun(runId);
    }
    this.pending.delete(runId);
    try {
      const state = decode(runId, raw);
      this.claimed.set(runId, raw);
      return state;
    } catch (err) {
      this.resolved.add(runId);
      throw err;
    }
  }

  async list(): Promise<RunState[]> {
    return Array.from(this.pending.entries()).map(([runId, raw]) => decode(runId, raw));
  }
}

const RUN_ID = /^[A-Za-z0-9_-]{1,64}$/;

/**
 * One JSON document per run under `<dataDir>/checkpoints`:
 *   <runId>.json          suspended, waiting for a decision
 *   <runId>.claimed.json  a resolver holds it
 *   <runId>.resolved      tombstone left by delete
 *   <runId>.corrupt       claimed but undecodable, kept for inspection
 * Claiming is a rename, so two processes cannot both win.
 */
export class JsonCheckpointStore implements CheckpointStore {
  private dir: string;

  constructor(baseDir: string) {
    this.dir = join(baseDir, 'checkpoints');
  }

  private pendingPath(runId: string) { return join(this.dir, `${runId}.json`); }
  private claimedPath(runId: string) { return join(this.dir, `${runId}.claimed.json`); }
  private tombstonePath(runId: string) { return join(this.dir, `${runId}.resolved`); }
  private corruptPath(runId: string) { return join(this.dir, `${runId}.corrupt`); }

  async put(runId: string, state: RunState): Promise<void> {
    assertRunId(runId);
    await writeFileAtomically(this.pendingPath(runId), JSON.stringify(state, null, 2));
    await rm(this.claimedPath(runId), { force: true });
  }

  async get(runId: string): Promise<RunState | undefined> {
    if (!RUN_ID.test(runId)) return undefined;
    for (const p of [this.pendingPath(runId), this.claimedPath(runId)]) {
      try {
        return decode(runId, await readFile(p, 'utf-8'));
      } catch (err) {
        if (!isErrno(err, 'ENOENT')) throw err;
      }
    }
    return undefined;
  }

  async delete(runId: string): Promise<void> {
    assertRunId(runId);
    await mkdir(this.dir, { recursive: true });
    await writeFile(this.tombstonePath(runId), String(Date.now()), 'utf-8');
    await rm(this.pendingPath(runId), { force: true });
    await rm(this.claimedPath(runId), { force: true });
  }

  async claim(runId: string): Promise<RunState> {
    if (!RUN_ID.test(runId)) throw new UnknownRun(runId);
    try {
      await rename(this.pendingPath(runId), this.claimedPath(runId));
    } catch (err) {
      if (!isErrno(err, 'ENOENT')) throw err;
      if (existsSync(this.claimedPath(runId)) || existsSync(this.tombstonePath(runId))) {
        throw new RunAlreadyResolved(runId);
      }
      throw new UnknownRun(runId);
    }
    const raw = await readFile(this.claimedPath(runId), 'utf-8');
    try {
      return decode(runId, raw);
    } catch (err) {
      await writeFile(this.tombstonePath(runId), String(Date.now()), 'utf-8');
      await rename(this.claimedPath(runId), this.corruptPath(runId));
      throw err;
    }
  }

  async list(): Promise<RunState[]> {
    if (!existsSync(this.dir)) return [];
    const files = await readdir(this.dir);
    const runIds = files
      .filter(f => f.endsWith('.json') && !f.endsWith('.claimed.json'))
      .map(f => f.slice(0, -'.json'.length));
    const states: RunState[] = [];
    for (const runId of runIds) {
      const state = await this.readPending(runId);
      if (state) states.push(state);
    }
    return states.sort((a, b) => a.createdAt - b.createdAt);
  }

  // A file can be claimed between readdir and read.
  private async readPending(runId: string): Promise<RunState | undefined> {
    try {
      return decode(runId, await readFile(this.pendingPath(runId), 'utf-8'));
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return undefined;
      throw err;
    }
  }
}

function assertRunId(runId: string) {
  if (!RUN_ID.test(runId)) throw new UnknownRun(runId);
}
