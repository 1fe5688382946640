import { describe, it, expect } from "vitest";
import { isAccepted, matchAssignment, slugify } from "./assignment-matcher.js";
import { AssignmentDefinition } from "./types.js";

function assignment(slug: string, acceptedCount = 1): AssignmentDefinition {
  return { slug, title: slug, deadline: null, acceptedCount };
}

describe("assignment matcher", () => {
  describe("slugify", () => {
    it("lowercases and hyphenates titles", () => {
      expect(slugify("Homework 1")).toBe("homework-1");
    });

    it("collapses whitespace runs and trims the ends", () => {
      expect(slugify("  Lab   Two\tFinal ")).toBe("lab-two-final");
    });
  });

  describe("matchAssignment", () => {
    it("returns the assignment whose slug prefixes the repository name", () => {
      const assignments = [assignment("hw1"), assignment("lab-2")];
      expect(matchAssignment("lab-2-alice", assignments)?.slug).toBe("lab-2");
    });

    it("compares against the lowercased repository name", () => {
      expect(matchAssignment("HW1-Alice", [assignment("hw1")])?.slug).toBe("hw1");
    });

    it("lets the first prefix in listing order win", () => {
      const assignments = [assignment("hw1"), assignment("hw1-extra")];
      expect(matchAssignment("hw1-extra-alice", assignments)?.slug).toBe("hw1");
    });

    it("picks the longer slug when it is listed first", () => {
      const assignments = [assignment("hw1-extra"), assignment("hw1")];
      expect(matchAssignment("hw1-extra-alice", assignments)?.slug).toBe("hw1-extra");
    });

    it("returns null when no slug prefixes the name", () => {
      expect(matchAssignment("project-alice", [assignment("hw1")])).toBeNull();
    });

    it("never matches an empty slug", () => {
      expect(matchAssignment("hw1-alice", [assignment("")])).toBeNull();
    });
  });

  describe("isAccepted", () => {
    it("requires at least one acceptance", () => {
      expect(isAccepted(assignment("hw1", 0))).toBe(false);
      expect(isAccepted(assignment("hw1", 1))).toBe(true);
      expect(isAccepted(assignment("hw1", 30))).toBe(true);
    });
  });
});
