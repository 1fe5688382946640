import { Credential, EventMapping, StudentIdentity } from "./types.js";
import { pairKey } from "./utils.js";

/**
 * Process-wide sync state: one credential per student and at most one
 * event mapping per (student, assignment slug).
 */
export interface SyncStore {
  getCredential(student: StudentIdentity): Credential | null;
  setCredential(student: StudentIdentity, credential: Credential): void;
  listStudents(): StudentIdentity[];
  getEventMapping(student: StudentIdentity, slug: string): EventMapping | null;
  /** Upsert keyed by (student, slug). */
  setEventMapping(mapping: EventMapping): void;
  listEventMappings(): EventMapping[];
}

export class InMemorySyncStore implements SyncStore {
  private readonly credentials = new Map<StudentIdentity, Credential>();
  private readonly mappings = new Map<string, EventMapping>();

  getCredential(student: StudentIdentity): Credential | null {
    const credential = this.credentials.get(student);
    return credential ? { ...credential } : null;
  }

  setCredential(student: StudentIdentity, credential: Credential): void {
    this.credentials.set(student, { ...credential });
  }

  listStudents(): StudentIdentity[] {
    return Array.from(this.credentials.keys());
  }

  getEventMapping(student: StudentIdentity, slug: string): EventMapping | null {
    const mapping = this.mappings.get(pairKey(student, slug));
    return mapping ? { ...mapping } : null;
  }

  setEventMapping(mapping: EventMapping): void {
    this.mappings.set(pairKey(mapping.student, mapping.slug), { ...mapping });
  }

  listEventMappings(): EventMapping[] {
    return Array.from(this.mappings.values(), (mapping) => ({ ...mapping }));
  }
}
