import Database from 'better-sqlite3';
import type { Logger } from '../logger.js';
import type { EntityPatch, EntityStatus, NewEntity, TrackedEntity, UserIdentity } from '../types.js';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS entities (
  key TEXT PRIMARY KEY,
  origin_chat_id INTEGER NOT NULL,
  origin_message_id INTEGER NOT NULL,
  summary TEXT NOT NULL DEFAULT '',
  queue TEXT NOT NULL,
  department_code TEXT,
  creator_id INTEGER,
  status TEXT NOT NULL DEFAULT 'open',
  last_status_key TEXT,
  last_assignee TEXT,
  last_comment_count INTEGER NOT NULL DEFAULT 0,
  deadline TEXT,
  dm_chat_id INTEGER,
  dm_message_id INTEGER,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS users (
  user_id INTEGER PRIMARY KEY,
  username TEXT,
  first_name TEXT NOT NULL DEFAULT '',
  registered_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS users_username ON users (username);

CREATE TABLE IF NOT EXISTS job_markers (
  name TEXT PRIMARY KEY,
  day TEXT NOT NULL
);
`;

interface EntityRow {
  key: string;
  origin_chat_id: number;
  origin_message_id: number;
  summary: string;
  queue: string;
  department_code: string | null;
  creator_id: number | null;
  status: string;
  last_status_key: string | null;
  last_assignee: string | null;
  last_comment_count: number;
  deadline: string | null;
  dm_chat_id: number | null;
  dm_message_id: number | null;
  created_at: string;
  updated_at: string;
}

interface UserRow {
  user_id: number;
  username: string | null;
  first_name: string;
  registered_at: string;
}

interface MarkerRow {
  name: string;
  day: string;
}

function fromRow(row: EntityRow): TrackedEntity {
  const status: EntityStatus = row.status === 'closed' ? 'closed' : 'open';
  return {
    key: row.key,
    originChatId: row.origin_chat_id,
    originMessageId: row.origin_message_id,
    summary: row.summary,
    queue: row.queue,
    departmentCode: row.department_code,
    creatorId: row.creator_id,
    status,
    lastKnownStatusKey: row.last_status_key,
    lastKnownAssignee: row.last_assignee,
    lastKnownCommentCount: row.last_comment_count,
    deadline: row.deadline,
    dmChatId: row.dm_chat_id,
    dmMessageId: row.dm_message_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toRow(entity: TrackedEntity): EntityRow {
  return {
    key: entity.key,
    origin_chat_id: entity.originChatId,
    origin_message_id: entity.originMessageId,
    summary: entity.summary,
    queue: entity.queue,
    department_code: entity.departmentCode,
    creator_id: entity.creatorId,
    status: entity.status,
    last_status_key: entity.lastKnownStatusKey,
    last_assignee: entity.lastKnownAssignee,
    last_comment_count: entity.lastKnownCommentCount,
    deadline: entity.deadline,
    dm_chat_id: entity.dmChatId,
    dm_message_id: entity.dmMessageId,
    created_at: entity.createdAt,
    updated_at: entity.updatedAt,
  };
}

/**
 * Owns the entity, user and job-marker tables. Everything is held in memory and
 * written through to SQLite on each mutation; a failed write is logged and the
 * in-memory copy stays authoritative for the rest of the process.
 */
export class StateManager {
  private db: Database.Database;
  private entities = new Map<string, TrackedEntity>();
  private users = new Map<number, UserIdentity>();
  private usernames = new Map<string, number>();
  private markers = new Map<string, string>();

  constructor(
    dbPath: string,
    private log: Logger,
    private now: () => Date = () => new Date()
  ) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(SCHEMA);
    this.load();
  }

  private load(): void {
    const entities = this.db.prepare('SELECT * FROM entities').all() as EntityRow[];
    for (const row of entities) {
      this.entities.set(row.key, fromRow(row));
    }

    const users = this.db.prepare('SELECT * FROM users').all() as UserRow[];
    for (const row of users) {
      this.users.set(row.user_id, {
        userId: row.user_id,
        username: row.username,
        firstName: row.first_name,
        registeredAt: row.registered_at,
      });
      if (row.username) this.usernames.set(row.username, row.user_id);
    }

    const markers = this.db.prepare('SELECT * FROM job_markers').all() as MarkerRow[];
    for (const row of markers) {
      this.markers.set(row.name, row.day);
    }

    this.log.debug(`Loaded ${this.entities.size} entities, ${this.users.size} users`);
  }

  private write(label: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.log.error(`Persisting ${label} failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private persistEntity(entity: TrackedEntity): void {
    this.write(entity.key, () => {
      this.db
        .prepare(
          `INSERT OR REPLACE INTO entities (
            key, origin_chat_id, origin_message_id, summary, queue, department_code, creator_id,
            status, last_status_key, last_assignee, last_comment_count, deadline,
            dm_chat_id, dm_message_id, created_at, updated_at
          ) VALUES (
            @key, @origin_chat_id, @origin_message_id, @summary, @queue, @department_code, @creator_id,
            @status, @last_status_key, @last_assignee, @last_comment_count, @deadline,
            @dm_chat_id, @dm_message_id, @created_at, @updated_at
          )`
        )
        .run(toRow(entity));
    });
  }

  // ── Entities ────────────────────────────────────────────────

  getEntity(key: string): TrackedEntity | null {
    const entity = this.entities.get(key);
    return entity ? { ...entity } : null;
  }

  hasEntity(key: string): boolean {
    return this.entities.has(key);
  }

  /** Records a freshly created issue. A key that is already tracked is left as it is. */
  addEntity(input: NewEntity): TrackedEntity {
    const existing = this.entities.get(input.key);
    if (existing) {
      this.log.warn(`${input.key} is already tracked, keeping the existing record`);
      return { ...existing };
    }

    const timestamp = this.now().toISOString();
    const entity: TrackedEntity = {
      key: input.key,
      originChatId: input.originChatId,
      originMessageId: input.originMessageId,
      summary: input.summary,
      queue: input.queue,
      departmentCode: input.departmentCode,
      creatorId: input.creatorId,
      status: 'open',
      lastKnownStatusKey: input.lastKnownStatusKey ?? null,
      lastKnownAssignee: input.lastKnownAssignee ?? null,
      lastKnownCommentCount: 0,
      deadline: input.deadline ?? null,
      dmChatId: null,
      dmMessageId: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.entities.set(entity.key, entity);
    this.persistEntity(entity);
    return { ...entity };
  }

  /**
   * Applies a patch and bumps `updatedAt`. Closing is one-way: a patch that
   * would reopen a closed entity keeps it closed.
   */
  updateEntity(key: string, patch: EntityPatch): TrackedEntity | null {
    const current = this.entities.get(key);
    if (!current) return null;

    const next: TrackedEntity = { ...current };
    for (const [field, value] of Object.entries(patch)) {
      if (value === undefined) continue;
      Object.assign(next, { [field]: value });
    }
    if (current.status === 'closed') next.status = 'closed';
    next.updatedAt = this.now().toISOString();

    this.entities.set(key, next);
    this.persistEntity(next);
    return { ...next };
  }

  listEntities(predicate: (entity: TrackedEntity) => boolean = () => true): TrackedEntity[] {
    const result: TrackedEntity[] = [];
    for (const entity of this.entities.values()) {
      if (predicate(entity)) result.push({ ...entity });
    }
    return result;
  }

  openEntities(): TrackedEntity[] {
    return this.listEntities((e) => e.status === 'open');
  }

  entitiesByCreator(userId: number, status?: EntityStatus): TrackedEntity[] {
    return this.listEntities((e) => e.creatorId === userId && (!status || e.status === status));
  }

  /** Entities whose "complete" buttons live on the given confirmation message. */
  entitiesByDmMessage(chatId: number, messageId: number): TrackedEntity[] {
    return this.listEntities((e) => e.dmChatId === chatId && e.dmMessageId === messageId);
  }

  // ── Users ───────────────────────────────────────────────────

  registerUser(userId: number, username: string | null, firstName: string): UserIdentity {
    const normalized = username ? username.replace(/^@/, '').toLowerCase() : null;
    const existing = this.users.get(userId);
    if (existing && existing.username === normalized && existing.firstName === firstName) {
      return { ...existing };
    }

    if (existing?.username && existing.username !== normalized) {
      this.usernames.delete(existing.username);
    }

    const user: UserIdentity = {
      userId,
      username: normalized,
      firstName,
      registeredAt: existing?.registeredAt ?? this.now().toISOString(),
    };
    this.users.set(userId, user);
    if (normalized) this.usernames.set(normalized, userId);

    this.write(`user ${userId}`, () => {
      this.db
        .prepare(
          `INSERT OR REPLACE INTO users (user_id, username, first_name, registered_at)
           VALUES (?, ?, ?, ?)`
        )
        .run(user.userId, user.username, user.firstName, user.registeredAt);
    });
    return { ...user };
  }

  getUser(userId: number): UserIdentity | null {
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  findUserIdByUsername(username: string): number | null {
    return this.usernames.get(username.replace(/^@/, '').toLowerCase()) ?? null;
  }

  // ── Job markers ─────────────────────────────────────────────

  hasMarker(name: string, day: string): boolean {
    return this.markers.get(name) === day;
  }

  setMarker(name: string, day: string): void {
    this.markers.set(name, day);
    this.write(`marker ${name}`, () => {
      this.db.prepare('INSERT OR REPLACE INTO job_markers (name, day) VALUES (?, ?)').run(name, day);
    });
  }

  close(): void {
    this.db.close();
  }
}
