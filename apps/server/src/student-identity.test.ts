import { describe, it, expect } from "vitest";
import {
  createStudentIdentityStrategy,
  ownerStrategy,
  ownerThenSuffixStrategy,
  repoSuffixStrategy
} from "./student-identity.js";
import { AssignmentDefinition, RepositoryEvent } from "./types.js";

function event(overrides: Partial<RepositoryEvent> = {}): RepositoryEvent {
  return {
    eventName: "repository",
    action: "created",
    repositoryName: "hw1-alice-smith",
    ownerLogin: "cs101-classroom",
    createdAt: "2026-02-20T15:00:00Z",
    ...overrides
  };
}

const hw1: AssignmentDefinition = { slug: "hw1", title: "HW1", deadline: null, acceptedCount: 3 };

describe("student identity strategies", () => {
  it("owner strategy returns the repository owner login", () => {
    expect(ownerStrategy.extract(event(), hw1)).toBe("cs101-classroom");
    expect(ownerStrategy.extract(event({ ownerLogin: null }), hw1)).toBeNull();
    expect(ownerStrategy.extract(event({ ownerLogin: "  " }), hw1)).toBeNull();
  });

  it("repo-suffix strategy strips the matched slug", () => {
    expect(repoSuffixStrategy.extract(event(), hw1)).toBe("alice-smith");
  });

  it("repo-suffix strategy keeps the original casing of the login", () => {
    expect(repoSuffixStrategy.extract(event({ repositoryName: "HW1-AliceSmith" }), hw1)).toBe("AliceSmith");
  });

  it("repo-suffix strategy falls back to the trailing segment without a match", () => {
    expect(repoSuffixStrategy.extract(event(), null)).toBe("smith");
    expect(repoSuffixStrategy.extract(event({ repositoryName: "standalone" }), null)).toBeNull();
  });

  it("owner-then-suffix prefers the owner and falls back to the suffix", () => {
    expect(ownerThenSuffixStrategy.extract(event(), hw1)).toBe("cs101-classroom");
    expect(ownerThenSuffixStrategy.extract(event({ ownerLogin: null }), hw1)).toBe("alice-smith");
  });

  it("creates strategies by configured name", () => {
    expect(createStudentIdentityStrategy("owner")).toBe(ownerStrategy);
    expect(createStudentIdentityStrategy("repo-suffix")).toBe(repoSuffixStrategy);
    expect(createStudentIdentityStrategy("owner-then-suffix")).toBe(ownerThenSuffixStrategy);
  });
});
