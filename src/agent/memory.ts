import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { isErrno, writeFileAtomically } from '../utils/fs.js';
import { SessionKey, Turn, turnSchema } from './types.js';

export interface MemoryStore {
  append(key: SessionKey, turn: Turn): Promise<void>;
  // Last `limit` turns, oldest first.
  recent(key: SessionKey, limit: number): Promise<Turn[]>;
  history(key: SessionKey): Promise<Turn[]>;
}

export function sessionKeyString(key: SessionKey): string {
  return `${encodeURIComponent(key.userId)}:${encodeURIComponent(key.sessionId)}`;
}

function lastN<T>(items: T[], limit: number): T[] {
  return limit <= 0 ? [] : items.slice(-limit);
}

export class InMemoryMemoryStore implements MemoryStore {
  private sessions = new Map<string, Turn[]>();

  async append(key: SessionKey, turn: Turn): Promise<void> {
    const k = sessionKeyString(key);
    const turns = this.sessions.get(k) ?? [];
    turns.push(structuredClone(turn));
    this.sessions.set(k, turns);
  }

  async recent(key: SessionKey, limit: number): Promise<Turn[]> {
    return lastN(await this.history(key), limit);
  }

  async history(key: SessionKey): Promise<Turn[]> {
    return (this.sessions.get(sessionKeyString(key)) ?? []).map(t => structuredClone(t));
  }
}

/** One JSON array of turns per session under `<dataDir>/sessions`. */
export class JsonMemoryStore implements MemoryStore {
  // Appends to one session file are chained so concurrent runs do not drop turns.
  private writes = new Map<string, Promise<void>>();

  constructor(private baseDir: string) {}

  private path(key: SessionKey) {
    return join(this.baseDir, 'sessions', `${encodeURIComponent(sessionKeyString(key))}.json`);
  }

  async append(key: SessionKey, turn: Turn): Promise<void> {
    const k = sessionKeyString(key);
    const previous = this.writes.get(k) ?? Promise.resolve();
    const next = previous.then(async () => {
      const turns = await this.history(key);
      turns.push(turn);
      await writeFileAtomically(this.path(key), JSON.stringify(turns, null, 2));
    });
    // Keep the chain alive after a failed write; the caller still sees the rejection.
    this.writes.set(k, next.catch(() => undefined));
    return next;
  }

  async recent(key: SessionKey, limit: number): Promise<Turn[]> {
    return lastN(await this.history(key), limit);
  }

  async history(key: SessionKey): Promise<Turn[]> {
    let raw: string;
    try {
      raw = await readFile(this.path(key), 'utf-8');
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return [];
      throw err;
    }
    return z.array(turnSchema).parse(JSON.parse(raw));
  }
}
