import NodeCache from 'node-cache';
import { v4 as uuidv4 } from 'uuid';
import { Table } from '../ir/types.js';
import { SessionNotFoundError } from '../utils/errors.js';
import { sessionLogger } from '../utils/logger.js';

export interface HistoryEntry {
  question: string;
  answer: string;
  askedAt: string;
}

export interface Session {
  id: string;
  fileName: string;
  sheetName: string;
  createdAt: Date;
  lastAccess: Date;
  table: Table;
  history: HistoryEntry[];
}

export interface SessionStoreOptions {
  ttlSeconds?: number; // idle time before eviction; 0 keeps sessions for the process lifetime
}

/**
 * In-memory sessions keyed by an opaque id. Created at process start and
 * cleared by `close()` at shutdown. There is no per-session locking: two
 * questions arriving together on one session are not serialized.
 */
export class SessionStore {
  private readonly cache: NodeCache;
  private readonly ttlSeconds: number;

  constructor(opts: SessionStoreOptions = {}) {
    this.ttlSeconds = opts.ttlSeconds ?? 0;
    this.cache = new NodeCache({
      stdTTL: this.ttlSeconds,
      checkperiod: this.ttlSeconds > 0 ? Math.min(60, this.ttlSeconds) : 0,
      useClones: false,
    });
    this.cache.on('expired', (key: NodeCache.Key) => {
      sessionLogger.info('Session expired', { sessionId: key });
    });
  }

  create(table: Table, meta: { fileName: string; sheetName: string }): Session {
    const now = new Date();
    const session: Session = {
      id: uuidv4(),
      fileName: meta.fileName,
      sheetName: meta.sheetName,
      createdAt: now,
      lastAccess: now,
      table,
      history: [],
    };
    this.cache.set(session.id, session);
    sessionLogger.info('Session created', { sessionId: session.id, fileName: meta.fileName, total: this.size() });
    return session;
  }

  get(id: string): Session | undefined {
    const session = this.cache.get<Session>(id);
    if (session) {
      session.lastAccess = new Date();
      if (this.ttlSeconds > 0) this.cache.ttl(id, this.ttlSeconds);
    }
    return session;
  }

  require(id: string): Session {
    const session = this.get(id);
    if (!session) throw new SessionNotFoundError(id);
    return session;
  }

  appendHistory(id: string, entry: HistoryEntry): HistoryEntry[] {
    const session = this.require(id);
    session.history.push(entry);
    return session.history;
  }

  delete(id: string): boolean {
    const removed = this.cache.del(id) > 0;
    if (removed) sessionLogger.info('Session deleted', { sessionId: id });
    return removed;
  }

  size(): number {
    return this.cache.keys().length;
  }

  close(): void {
    this.cache.flushAll();
    this.cache.close();
  }
}
