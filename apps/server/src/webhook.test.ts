import { describe, it, expect } from "vitest";
import { InvalidEventPayloadError } from "./errors.js";
import { isRepositoryCreation, parseRepositoryEvent, signPayload, verifyWebhookSignature } from "./webhook.js";

const payload = {
  action: "created",
  repository: {
    name: "hw1-alice",
    owner: { login: "alice" },
    created_at: "2026-02-20T15:00:00Z",
    private: true
  },
  sender: { login: "github-classroom[bot]" }
};

describe("parseRepositoryEvent", () => {
  it("extracts the fields the sync needs", () => {
    expect(parseRepositoryEvent("repository", payload)).toEqual({
      eventName: "repository",
      action: "created",
      repositoryName: "hw1-alice",
      ownerLogin: "alice",
      createdAt: "2026-02-20T15:00:00Z"
    });
  });

  it("converts epoch-second creation times", () => {
    const event = parseRepositoryEvent("push", {
      action: "pushed",
      repository: { name: "hw1-alice", owner: { login: "alice" }, created_at: 1771599600 }
    });
    expect(event.createdAt).toBe("2026-02-20T15:00:00.000Z");
  });

  it("tolerates a missing owner", () => {
    const event = parseRepositoryEvent("repository", { action: "created", repository: { name: "hw1-alice" } });
    expect(event.ownerLogin).toBeNull();
    expect(event.createdAt).toBeNull();
  });

  it("rejects payloads without a repository name", () => {
    expect(() => parseRepositoryEvent("repository", { action: "created", repository: {} })).toThrow(
      InvalidEventPayloadError
    );
  });

  it("rejects deliveries without an event name", () => {
    expect(() => parseRepositoryEvent(undefined, payload)).toThrow("Missing X-GitHub-Event header");
  });

  it("recognises repository creation only", () => {
    expect(isRepositoryCreation(parseRepositoryEvent("repository", payload))).toBe(true);
    expect(isRepositoryCreation(parseRepositoryEvent("repository", { ...payload, action: "deleted" }))).toBe(false);
    expect(isRepositoryCreation(parseRepositoryEvent("push", payload))).toBe(false);
  });
});

describe("verifyWebhookSignature", () => {
  const body = JSON.stringify(payload);

  it("accepts a matching sha256 signature", () => {
    expect(verifyWebhookSignature("test-secret", body, signPayload("test-secret", body))).toBe(true);
  });

  it("rejects a signature made with another secret", () => {
    expect(verifyWebhookSignature("test-secret", body, signPayload("other-secret", body))).toBe(false);
  });

  it("rejects missing or malformed headers", () => {
    expect(verifyWebhookSignature("test-secret", body, undefined)).toBe(false);
    expect(verifyWebhookSignature("test-secret", body, "sha1=abc")).toBe(false);
    expect(verifyWebhookSignature("test-secret", body, "sha256=abc")).toBe(false);
  });

  it("detects a tampered body", () => {
    const signature = signPayload("test-secret", body);
    expect(verifyWebhookSignature("test-secret", body.replace("alice", "mallory"), signature)).toBe(false);
  });
});
