import { AssignmentDefinition, RepositoryEvent, StudentIdentity } from "./types.js";

export type StudentIdentityStrategyName = "owner" | "repo-suffix" | "owner-then-suffix";

export interface StudentIdentityStrategy {
  readonly name: StudentIdentityStrategyName;
  extract(event: RepositoryEvent, assignment: AssignmentDefinition | null): StudentIdentity | null;
}

function nonEmpty(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * The login that owns the repository. Works when Classroom creates the repo
 * under the student's account.
 */
export const ownerStrategy: StudentIdentityStrategy = {
  name: "owner",
  extract(event) {
    return nonEmpty(event.ownerLogin);
  }
};

/**
 * The part of an org-owned repository name after the assignment slug,
 * e.g. "hw1-alice-smith" with slug "hw1" yields "alice-smith". Without a
 * matched slug the last hyphen-separated segment is used.
 */
export const repoSuffixStrategy: StudentIdentityStrategy = {
  name: "repo-suffix",
  extract(event, assignment) {
    const name = event.repositoryName;

    if (assignment) {
      const prefix = `${assignment.slug}-`;
      if (name.toLowerCase().startsWith(prefix)) {
        return nonEmpty(name.slice(prefix.length));
      }
    }

    const separator = name.lastIndexOf("-");
    if (separator <= 0) {
      return null;
    }
    return nonEmpty(name.slice(separator + 1));
  }
};

export const ownerThenSuffixStrategy: StudentIdentityStrategy = {
  name: "owner-then-suffix",
  extract(event, assignment) {
    return ownerStrategy.extract(event, assignment) ?? repoSuffixStrategy.extract(event, assignment);
  }
};

export function createStudentIdentityStrategy(name: StudentIdentityStrategyName): StudentIdentityStrategy {
  switch (name) {
    case "owner":
      return ownerStrategy;
    case "repo-suffix":
      return repoSuffixStrategy;
    case "owner-then-suffix":
      return ownerThenSuffixStrategy;
  }
}
