import { describe, it, expect, afterEach, vi } from "vitest";
import { GitHubClassroomClient, toAssignmentDefinition } from "./classroom-client.js";
import { UpstreamUnavailableError } from "./errors.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

describe("GitHubClassroomClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("reports whether a token is configured", () => {
    expect(new GitHubClassroomClient("test-token").isConfigured()).toBe(true);
    expect(new GitHubClassroomClient("").isConfigured()).toBe(false);
  });

  it("refuses to call the API without a token", async () => {
    const client = new GitHubClassroomClient("");
    await expect(client.listAssignments("7")).rejects.toThrow("GitHub token not configured (set GITHUB_TOKEN)");
  });

  it("maps the classroom assignment listing", async () => {
    const fetchMock = vi.fn(async () =>
      jsonResponse([
        { id: 1, title: "Homework 1", slug: "homework-1", deadline: "2026-03-01T23:59:00Z", accepted: 12, submitted: 3 },
        { id: 2, title: "Final Project", slug: null, deadline: null, accepted: 0 }
      ])
    );
    vi.stubGlobal("fetch", fetchMock);

    const assignments = await new GitHubClassroomClient("test-token").listAssignments("7");

    expect(assignments).toEqual([
      { slug: "homework-1", title: "Homework 1", deadline: "2026-03-01T23:59:00Z", acceptedCount: 12 },
      { slug: "final-project", title: "Final Project", deadline: null, acceptedCount: 0 }
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]).toEqual([
      "https://api.github.com/classrooms/7/assignments?page=1&per_page=100",
      expect.objectContaining({
        headers: expect.objectContaining({ Authorization: "Bearer test-token" })
      })
    ]);
  });

  it("follows pagination until a short page", async () => {
    const fullPage = Array.from({ length: 100 }, (_, index) => ({
      title: `Lab ${index}`,
      slug: `lab-${index}`,
      deadline: null,
      accepted: 1
    }));
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse(fullPage))
      .mockResolvedValueOnce(jsonResponse([{ title: "Lab 100", slug: "lab-100", deadline: null, accepted: 1 }]));
    vi.stubGlobal("fetch", fetchMock);

    const assignments = await new GitHubClassroomClient("test-token").listAssignments("7");

    expect(assignments).toHaveLength(101);
    expect(assignments[100]?.slug).toBe("lab-100");
    expect(fetchMock.mock.calls[1]?.[0]).toBe("https://api.github.com/classrooms/7/assignments?page=2&per_page=100");
  });

  it("turns API errors into UpstreamUnavailableError with the GitHub message", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ message: "Not Found" }, 404)));

    const failure = new GitHubClassroomClient("test-token").listAssignments("7");
    await expect(failure).rejects.toBeInstanceOf(UpstreamUnavailableError);
    await expect(failure).rejects.toThrow("GitHub Classroom API error (404): Not Found");
  });

  it("turns network failures into UpstreamUnavailableError", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );

    await expect(new GitHubClassroomClient("test-token").listAssignments("7")).rejects.toThrow(
      "GitHub Classroom request failed: fetch failed"
    );
  });

  it("rejects listings that are not assignment arrays", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ assignments: [] })));

    await expect(new GitHubClassroomClient("test-token").listAssignments("7")).rejects.toThrow(
      "GitHub Classroom returned an unexpected assignment listing"
    );
  });
});

describe("toAssignmentDefinition", () => {
  it("lowercases upstream slugs", () => {
    expect(toAssignmentDefinition({ title: "HW 1", slug: "HW-1", deadline: undefined, accepted: 2 })).toEqual({
      slug: "hw-1",
      title: "HW 1",
      deadline: null,
      acceptedCount: 2
    });
  });
});
