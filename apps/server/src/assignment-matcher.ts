import { AssignmentDefinition } from "./types.js";

export function slugify(title: string): string {
  return title.trim().toLowerCase().replace(/\s+/g, "-");
}

export function isAccepted(assignment: AssignmentDefinition): boolean {
  return assignment.acceptedCount >= 1;
}

/**
 * Resolve a Classroom repository name (e.g. "hw1-alice") to its assignment.
 *
 * The first assignment in listing order whose slug prefixes the lowercased
 * repository name wins, so a slug that prefixes another slug ("hw1" vs
 * "hw1-extra") shadows it.
 */
export function matchAssignment(
  repositoryName: string,
  assignments: readonly AssignmentDefinition[]
): AssignmentDefinition | null {
  const name = repositoryName.toLowerCase();

  for (const assignment of assignments) {
    if (assignment.slug.length > 0 && name.startsWith(assignment.slug)) {
      return assignment;
    }
  }

  return null;
}
