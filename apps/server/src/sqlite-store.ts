import Database from "better-sqlite3";
import { SyncStore } from "./store.js";
import { Credential, EventMapping, StudentIdentity } from "./types.js";

interface CredentialRow {
  student: string;
  accessToken: string;
  refreshToken: string | null;
  expiresAt: number | null;
  scope: string | null;
  updatedAt: string;
}

interface EventMappingRow {
  student: string;
  slug: string;
  eventId: string;
  htmlLink: string;
  createdAt: string;
  updatedAt: string;
}

function toCredential(row: CredentialRow): Credential {
  return {
    accessToken: row.accessToken,
    refreshToken: row.refreshToken ?? undefined,
    expiresAt: row.expiresAt,
    scope: row.scope ?? undefined,
    updatedAt: row.updatedAt
  };
}

function toEventMapping(row: EventMappingRow): EventMapping {
  return {
    student: row.student,
    slug: row.slug,
    eventId: row.eventId,
    htmlLink: row.htmlLink,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt
  };
}

/**
 * SQLite-backed store. Pass ":memory:" for a throwaway database.
 */
export class SqliteSyncStore implements SyncStore {
  private db: Database.Database;

  constructor(dbPath: string = "deadline-sync.db") {
    this.db = new Database(dbPath);
    this.initializeSchema();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS credentials (
        student TEXT PRIMARY KEY,
        accessToken TEXT NOT NULL,
        refreshToken TEXT,
        expiresAt INTEGER,
        scope TEXT,
        updatedAt TEXT NOT NULL,
        insertOrder INTEGER NOT NULL DEFAULT (unixepoch('subsec') * 1000000)
      );

      CREATE TABLE IF NOT EXISTS event_mappings (
        student TEXT NOT NULL,
        slug TEXT NOT NULL,
        eventId TEXT NOT NULL,
        htmlLink TEXT NOT NULL,
        createdAt TEXT NOT NULL,
        updatedAt TEXT NOT NULL,
        insertOrder INTEGER NOT NULL DEFAULT (unixepoch('subsec') * 1000000),
        PRIMARY KEY (student, slug)
      );
    `);
  }

  getCredential(student: StudentIdentity): Credential | null {
    const row = this.db.prepare("SELECT * FROM credentials WHERE student = ?").get(student) as
      | CredentialRow
      | undefined;

    return row ? toCredential(row) : null;
  }

  setCredential(student: StudentIdentity, credential: Credential): void {
    this.db
      .prepare(
        `INSERT INTO credentials (student, accessToken, refreshToken, expiresAt, scope, updatedAt)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(student) DO UPDATE SET
           accessToken = excluded.accessToken,
           refreshToken = excluded.refreshToken,
           expiresAt = excluded.expiresAt,
           scope = excluded.scope,
           updatedAt = excluded.updatedAt`
      )
      .run(
        student,
        credential.accessToken,
        credential.refreshToken ?? null,
        credential.expiresAt,
        credential.scope ?? null,
        credential.updatedAt
      );
  }

  listStudents(): StudentIdentity[] {
    const rows = this.db.prepare("SELECT student FROM credentials ORDER BY insertOrder ASC, rowid ASC").all() as Array<{
      student: string;
    }>;
    return rows.map((row) => row.student);
  }

  getEventMapping(student: StudentIdentity, slug: string): EventMapping | null {
    const row = this.db
      .prepare("SELECT * FROM event_mappings WHERE student = ? AND slug = ?")
      .get(student, slug) as EventMappingRow | undefined;

    return row ? toEventMapping(row) : null;
  }

  setEventMapping(mapping: EventMapping): void {
    this.db
      .prepare(
        `INSERT INTO event_mappings (student, slug, eventId, htmlLink, createdAt, updatedAt)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(student, slug) DO UPDATE SET
           eventId = excluded.eventId,
           htmlLink = excluded.htmlLink,
           updatedAt = excluded.updatedAt`
      )
      .run(mapping.student, mapping.slug, mapping.eventId, mapping.htmlLink, mapping.createdAt, mapping.updatedAt);
  }

  listEventMappings(): EventMapping[] {
    const rows = this.db
      .prepare("SELECT * FROM event_mappings ORDER BY insertOrder ASC, rowid ASC")
      .all() as EventMappingRow[];
    return rows.map(toEventMapping);
  }

  close(): void {
    this.db.close();
  }
}
