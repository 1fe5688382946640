import { describe, it, expect } from "vitest";
import { InMemorySyncStore, SyncStore } from "./store.js";
import { SqliteSyncStore } from "./sqlite-store.js";
import { Credential, EventMapping } from "./types.js";

const credential: Credential = {
  accessToken: "access-1",
  refreshToken: "refresh-1",
  expiresAt: 1_800_000_000_000,
  scope: "https://www.googleapis.com/auth/calendar.events",
  updatedAt: "2026-02-17T18:00:00.000Z"
};

function mapping(overrides: Partial<EventMapping> = {}): EventMapping {
  return {
    student: "alice",
    slug: "hw1",
    eventId: "evt-1",
    htmlLink: "https://calendar.google.com/event?eid=evt-1",
    createdAt: "2026-02-17T18:00:00.000Z",
    updatedAt: "2026-02-17T18:00:00.000Z",
    ...overrides
  };
}

describe.each([
  ["InMemorySyncStore", (): SyncStore => new InMemorySyncStore()],
  ["SqliteSyncStore", (): SyncStore => new SqliteSyncStore(":memory:")]
])("%s", (_name, createStore) => {
  describe("credentials", () => {
    it("returns null for an unknown student", () => {
      const store = createStore();
      expect(store.getCredential("nobody")).toBeNull();
    });

    it("stores and overwrites a credential per student", () => {
      const store = createStore();
      store.setCredential("alice", credential);
      store.setCredential("alice", { ...credential, accessToken: "access-2", refreshToken: undefined });

      expect(store.getCredential("alice")).toEqual({
        accessToken: "access-2",
        refreshToken: undefined,
        expiresAt: 1_800_000_000_000,
        scope: "https://www.googleapis.com/auth/calendar.events",
        updatedAt: "2026-02-17T18:00:00.000Z"
      });
      expect(store.listStudents()).toEqual(["alice"]);
    });

    it("lists students in the order they connected", () => {
      const store = createStore();
      store.setCredential("alice", credential);
      store.setCredential("bob", credential);

      expect(store.listStudents()).toEqual(["alice", "bob"]);
    });
  });

  describe("event mappings", () => {
    it("keeps at most one mapping per student and slug", () => {
      const store = createStore();
      store.setEventMapping(mapping());
      store.setEventMapping(mapping({ updatedAt: "2026-02-18T09:00:00.000Z" }));

      const all = store.listEventMappings();
      expect(all).toHaveLength(1);
      expect(all[0]?.updatedAt).toBe("2026-02-18T09:00:00.000Z");
      expect(all[0]?.createdAt).toBe("2026-02-17T18:00:00.000Z");
    });

    it("separates mappings by student and by slug", () => {
      const store = createStore();
      store.setEventMapping(mapping());
      store.setEventMapping(mapping({ student: "bob", eventId: "evt-2" }));
      store.setEventMapping(mapping({ slug: "hw2", eventId: "evt-3" }));

      expect(store.getEventMapping("alice", "hw1")?.eventId).toBe("evt-1");
      expect(store.getEventMapping("bob", "hw1")?.eventId).toBe("evt-2");
      expect(store.getEventMapping("alice", "hw2")?.eventId).toBe("evt-3");
      expect(store.getEventMapping("bob", "hw2")).toBeNull();
      expect(store.listEventMappings()).toHaveLength(3);
    });

    it("returns copies so callers cannot mutate stored state", () => {
      const store = createStore();
      store.setEventMapping(mapping());

      const fetched = store.getEventMapping("alice", "hw1");
      if (fetched) {
        fetched.eventId = "tampered";
      }

      expect(store.getEventMapping("alice", "hw1")?.eventId).toBe("evt-1");
    });
  });
});
