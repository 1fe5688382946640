import { resolve } from "path";
import { createApp } from "./app.js";
import { AssignmentCache } from "./assignment-cache.js";
import { GitHubClassroomClient } from "./classroom-client.js";
import { config } from "./config.js";
import { CredentialStore } from "./credential-store.js";
import { DeadlineSyncService } from "./deadline-sync.js";
import { EventReconciler } from "./event-reconciler.js";
import { GoogleCalendarClient } from "./google-calendar-client.js";
import { GoogleOAuthService } from "./google-oauth.js";
import { SqliteSyncStore } from "./sqlite-store.js";
import { InMemorySyncStore, SyncStore } from "./store.js";
import { createStudentIdentityStrategy } from "./student-identity.js";

function createStore(): { store: SyncStore; close: () => void } {
  if (config.STORE_BACKEND === "sqlite") {
    const sqliteStore = new SqliteSyncStore(config.SQLITE_DB_PATH);
    return { store: sqliteStore, close: () => sqliteStore.close() };
  }
  return { store: new InMemorySyncStore(), close: () => {} };
}

const persistence = createStore();
const store = persistence.store;

const oauth = new GoogleOAuthService();
const classroom = new GitHubClassroomClient();
const credentials = new CredentialStore(store, oauth);
const assignments = new AssignmentCache(classroom, config.CLASSROOM_ID ?? "", {
  ttlMs: config.ASSIGNMENT_CACHE_TTL_SECONDS * 1000
});
const reconciler = new EventReconciler(store, credentials, new GoogleCalendarClient(), {
  calendarId: config.GOOGLE_CALENDAR_ID,
  timeZone: config.TIMEZONE,
  displayDurationMinutes: config.EVENT_DISPLAY_DURATION_MINUTES
});
const syncService = new DeadlineSyncService({
  store,
  credentials,
  assignments,
  reconciler,
  identityStrategy: createStudentIdentityStrategy(config.STUDENT_IDENTITY_STRATEGY)
});

const app = createApp({
  sync: syncService,
  credentials,
  oauth,
  webhookSecret: config.WEBHOOK_SECRET,
  debugRoutes: config.DEBUG_ROUTES_ENABLED
});

if (!config.WEBHOOK_SECRET) {
  console.warn("[server] WEBHOOK_SECRET not set; webhook signatures will not be verified");
}

if (!oauth.isConfigured()) {
  console.warn("[server] GOOGLE_CLIENT_ID/GOOGLE_CLIENT_SECRET not set; students cannot connect calendars");
}

if (config.SWEEP_ENABLED && config.CLASSROOM_ID && classroom.isConfigured()) {
  syncService.start(config.SWEEP_INTERVAL_MINUTES * 60 * 1000);
} else {
  console.warn("[server] periodic sweep disabled (needs SWEEP_ENABLED, CLASSROOM_ID and GITHUB_TOKEN)");
}

const server = app.listen(config.PORT, () => {
  console.log(`[server] listening on http://localhost:${config.PORT}`);
  console.log(
    `[server] storage backend=${config.STORE_BACKEND}` +
      (config.STORE_BACKEND === "sqlite" ? ` sqlite=${resolve(config.SQLITE_DB_PATH)}` : "") +
      ` timezone=${config.TIMEZONE} identity=${config.STUDENT_IDENTITY_STRATEGY}`
  );
});

let shuttingDown = false;

const shutdown = (): void => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  syncService.stop();

  server.close(() => {
    try {
      persistence.close();
    } catch (error) {
      console.error("[server] failed closing the sync store", error);
    }
    process.exit(0);
  });
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
