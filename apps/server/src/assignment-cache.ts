import { ClassroomGateway } from "./classroom-client.js";
import { toUpstreamError } from "./upstream.js";
import { AssignmentCacheSnapshot, AssignmentDefinition } from "./types.js";
import { Clock, systemClock } from "./utils.js";

export interface AssignmentCacheOptions {
  ttlMs?: number;
  now?: Clock;
}

interface CacheEntry {
  assignments: AssignmentDefinition[];
  fetchedAt: number;
}

/**
 * Time-boxed copy of a classroom's assignment listing. Upstream failures are
 * never masked with stale data.
 */
export class AssignmentCache {
  private readonly classroom: ClassroomGateway;
  private readonly classroomId: string;
  private readonly ttlMs: number;
  private readonly now: Clock;
  private entry: CacheEntry | null = null;
  private refreshInFlight: Promise<AssignmentDefinition[]> | null = null;
  private generation = 0;

  constructor(classroom: ClassroomGateway, classroomId: string, options: AssignmentCacheOptions = {}) {
    this.classroom = classroom;
    this.classroomId = classroomId;
    this.ttlMs = options.ttlMs ?? 600_000;
    this.now = options.now ?? systemClock;
  }

  isFresh(): boolean {
    return this.entry !== null && this.now() - this.entry.fetchedAt < this.ttlMs;
  }

  async getAssignments(): Promise<AssignmentDefinition[]> {
    if (this.entry && this.isFresh()) {
      return [...this.entry.assignments];
    }

    const assignments = await (this.refreshInFlight ?? this.startRefresh());
    return [...assignments];
  }

  private startRefresh(): Promise<AssignmentDefinition[]> {
    const refresh = this.refresh();
    this.refreshInFlight = refresh;
    const settled = (): void => {
      if (this.refreshInFlight === refresh) {
        this.refreshInFlight = null;
      }
    };
    void refresh.then(settled, settled);
    return refresh;
  }

  private async refresh(): Promise<AssignmentDefinition[]> {
    const generation = this.generation;
    try {
      const assignments = await this.classroom.listAssignments(this.classroomId);
      // A fetch started before invalidate() returns to its own callers but is never cached.
      if (generation === this.generation) {
        this.entry = { assignments, fetchedAt: this.now() };
      }
      return assignments;
    } catch (error) {
      throw toUpstreamError(error, "GitHub Classroom assignment listing");
    }
  }

  invalidate(): void {
    this.generation += 1;
    this.entry = null;
    this.refreshInFlight = null;
  }

  snapshot(): AssignmentCacheSnapshot {
    if (!this.entry) {
      return { assignments: [], fetchedAt: null };
    }

    return {
      assignments: [...this.entry.assignments],
      fetchedAt: new Date(this.entry.fetchedAt).toISOString()
    };
  }
}
