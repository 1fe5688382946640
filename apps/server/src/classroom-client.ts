import { z } from "zod";
import { config } from "./config.js";
import { slugify } from "./assignment-matcher.js";
import { UpstreamUnavailableError } from "./errors.js";
import { AssignmentDefinition } from "./types.js";

/**
 * Source of classroom assignment definitions.
 */
export interface ClassroomGateway {
  listAssignments(classroomId: string): Promise<AssignmentDefinition[]>;
}

const classroomAssignmentSchema = z.object({
  id: z.number().optional(),
  title: z.string(),
  slug: z.string().nullish(),
  deadline: z.string().nullish(),
  accepted: z.number().int().nonnegative().default(0)
});

const classroomAssignmentsSchema = z.array(classroomAssignmentSchema);

export type ClassroomAssignment = z.infer<typeof classroomAssignmentSchema>;

export function toAssignmentDefinition(assignment: ClassroomAssignment): AssignmentDefinition {
  const slug = assignment.slug && assignment.slug.trim().length > 0 ? assignment.slug.trim().toLowerCase() : slugify(assignment.title);

  return {
    slug,
    title: assignment.title,
    deadline: assignment.deadline ?? null,
    acceptedCount: assignment.accepted
  };
}

export class GitHubClassroomClient implements ClassroomGateway {
  private readonly token: string | undefined;
  private readonly timeoutMs: number;
  private readonly baseUrl = "https://api.github.com";
  private readonly pageSize = 100;

  constructor(token?: string, timeoutMs?: number) {
    this.token = token ?? config.GITHUB_TOKEN;
    this.timeoutMs = timeoutMs ?? config.UPSTREAM_TIMEOUT_MS;
  }

  isConfigured(): boolean {
    return Boolean(this.token);
  }

  private async fetch(endpoint: string): Promise<unknown> {
    if (!this.token) {
      throw new UpstreamUnavailableError("GitHub token not configured (set GITHUB_TOKEN)");
    }

    const url = `${this.baseUrl}${endpoint}`;
    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          Authorization: `Bearer ${this.token}`,
          Accept: "application/vnd.github+json",
          "X-GitHub-Api-Version": "2022-11-28",
          "User-Agent": "Classroom-Deadline-Sync"
        },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : "unknown error";
      throw new UpstreamUnavailableError(`GitHub Classroom request failed: ${reason}`, undefined, error);
    }

    if (!response.ok) {
      let errorDetail = response.statusText;
      try {
        const body = (await response.json()) as { message?: string };
        if (body.message) {
          errorDetail = body.message;
        }
      } catch {
        // Keep default status text when body isn't JSON.
      }
      throw new UpstreamUnavailableError(
        `GitHub Classroom API error (${response.status}): ${errorDetail}`,
        response.status
      );
    }

    return response.json();
  }

  /**
   * List every assignment in a classroom, following pagination.
   */
  async listAssignments(classroomId: string): Promise<AssignmentDefinition[]> {
    const assignments: AssignmentDefinition[] = [];

    for (let page = 1; ; page += 1) {
      const body = await this.fetch(
        `/classrooms/${encodeURIComponent(classroomId)}/assignments?page=${page}&per_page=${this.pageSize}`
      );
      const parsed = classroomAssignmentsSchema.safeParse(body);
      if (!parsed.success) {
        throw new UpstreamUnavailableError("GitHub Classroom returned an unexpected assignment listing");
      }

      assignments.push(...parsed.data.map(toAssignmentDefinition));
      if (parsed.data.length < this.pageSize) {
        return assignments;
      }
    }
  }
}
