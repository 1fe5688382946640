import type { IncomingMessage } from "http";
import cors from "cors";
import express from "express";
import { z } from "zod";
import { CredentialStore } from "./credential-store.js";
import { DeadlineSyncService } from "./deadline-sync.js";
import { InvalidEventPayloadError, toSyncFailure } from "./errors.js";
import { RepositoryEvent, SyncErrorCode, WebhookOutcome } from "./types.js";
import { REPOSITORY_EVENT, parseRepositoryEvent, verifyWebhookSignature } from "./webhook.js";

export interface AuthUrlProvider {
  isConfigured(): boolean;
  getAuthUrl(student: string): string;
}

export interface AppDependencies {
  sync: DeadlineSyncService;
  credentials: CredentialStore;
  oauth: AuthUrlProvider;
  webhookSecret?: string;
  debugRoutes?: boolean;
}

const loginQuerySchema = z.object({
  student: z.string().trim().min(1)
});

const callbackQuerySchema = z
  .object({
    code: z.string().min(1),
    state: z.string().trim().min(1).optional(),
    student: z.string().trim().min(1).optional()
  })
  .refine((query) => Boolean(query.state ?? query.student), {
    message: "state (or student) is required",
    path: ["state"]
  });

const failureStatus: Record<SyncErrorCode, number> = {
  NOT_AUTHENTICATED: 401,
  CREDENTIAL_EXPIRED: 401,
  ASSIGNMENT_NOT_FOUND: 404,
  INVALID_DEADLINE: 422,
  INVALID_EVENT_PAYLOAD: 400,
  UPSTREAM_UNAVAILABLE: 502,
  INTERNAL: 500
};

export function webhookHttpStatus(outcome: WebhookOutcome): number {
  return outcome.status === "failed" ? failureStatus[outcome.error.code] : 200;
}

export function createApp(dependencies: AppDependencies): express.Express {
  const { sync, credentials, oauth, webhookSecret } = dependencies;
  const app = express();
  const rawBodies = new WeakMap<IncomingMessage, Buffer>();

  app.use(cors());
  app.use(
    express.json({
      limit: "5mb",
      verify: (req, _res, buf) => {
        rawBodies.set(req, buf);
      }
    })
  );

  app.get("/api/health", (_req, res) => {
    return res.json({
      status: "ok",
      sweepRunning: sync.isRunning(),
      lastSweep: sync.getLastSweep()
    });
  });

  app.get("/auth/login", (req, res) => {
    const parsed = loginQuerySchema.safeParse(req.query ?? {});

    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid login query", issues: parsed.error.issues });
    }

    if (!oauth.isConfigured()) {
      return res.status(503).json({ error: "Google OAuth credentials not configured" });
    }

    return res.json({ url: oauth.getAuthUrl(parsed.data.student) });
  });

  app.get("/auth/callback", async (req, res) => {
    const parsed = callbackQuerySchema.safeParse(req.query ?? {});

    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid OAuth callback", issues: parsed.error.issues });
    }

    const student = parsed.data.state ?? parsed.data.student ?? "";

    try {
      await credentials.connect(student, parsed.data.code);
      console.info(`[server] stored Google credential for ${student}`);
      return res.json({ status: "success", student });
    } catch (error) {
      const failure = toSyncFailure(error);
      console.error(`[server] OAuth callback failed for ${student}`, error);
      return res.status(502).json({ error: "Failed to complete Google authorization", code: failure.code });
    }
  });

  app.post("/webhook", async (req, res) => {
    if (webhookSecret) {
      const signature = req.get("X-Hub-Signature-256");
      const rawBody = rawBodies.get(req) ?? Buffer.alloc(0);
      if (!verifyWebhookSignature(webhookSecret, rawBody, signature)) {
        console.warn("[webhook] rejected delivery with a bad signature");
        return res.status(401).json({ error: "Invalid webhook signature" });
      }
    }

    const eventName = req.get("X-GitHub-Event");
    if (eventName && eventName !== REPOSITORY_EVENT) {
      console.info(`[webhook] ignoring ${eventName} delivery`);
      const outcome: WebhookOutcome = { status: "ignored", reason: "unsupported-event" };
      return res.json(outcome);
    }

    let event: RepositoryEvent;
    try {
      event = parseRepositoryEvent(eventName, req.body);
    } catch (error) {
      if (error instanceof InvalidEventPayloadError) {
        return res.status(400).json({ error: error.message, code: error.code, issues: error.issues });
      }
      throw error;
    }

    console.info(`[webhook] ${event.eventName}/${event.action} ${event.repositoryName} owner=${event.ownerLogin ?? "?"}`);
    const outcome = await sync.handleWebhook(event);
    return res.status(webhookHttpStatus(outcome)).json(outcome);
  });

  if (dependencies.debugRoutes ?? true) {
    app.get("/debug/assignments", (_req, res) => {
      return res.json(sync.getAssignmentSnapshot());
    });

    app.get("/debug/mappings", (_req, res) => {
      return res.json({ mappings: sync.listMappings() });
    });

    app.get("/debug/students", (_req, res) => {
      return res.json({ students: sync.listStudents() });
    });

    app.get("/debug/orphans", async (_req, res) => {
      try {
        return res.json({ mappings: await sync.findOrphanedMappings() });
      } catch (error) {
        const failure = toSyncFailure(error);
        return res.status(failureStatus[failure.code]).json({ error: failure.message, code: failure.code });
      }
    });

    app.post("/debug/sweep", async (_req, res) => {
      try {
        const result = await sync.triggerSweep();
        return res.status(result.success ? 200 : 502).json(result);
      } catch (error) {
        const failure = toSyncFailure(error);
        console.error("[server] manual sweep failed", error);
        return res.status(failureStatus[failure.code]).json({ error: failure.message, code: failure.code });
      }
    });

    app.post("/debug/cache/invalidate", (_req, res) => {
      sync.invalidateAssignments();
      return res.json({ status: "invalidated" });
    });
  }

  return app;
}
