import { createHmac, timingSafeEqual } from "crypto";
import { z } from "zod";
import { InvalidEventPayloadError } from "./errors.js";
import { RepositoryEvent } from "./types.js";

const repositoryPayloadSchema = z.object({
  action: z.string().min(1),
  repository: z.object({
    name: z.string().min(1),
    owner: z
      .object({
        login: z.string().nullish()
      })
      .nullish(),
    created_at: z.union([z.string(), z.number()]).nullish()
  })
});

const SIGNATURE_PREFIX = "sha256=";

export const REPOSITORY_EVENT = "repository";

/**
 * Validate a GitHub delivery. Only the fields the sync needs are checked; the
 * rest of the payload is ignored.
 */
export function parseRepositoryEvent(eventName: string | undefined, body: unknown): RepositoryEvent {
  if (!eventName) {
    throw new InvalidEventPayloadError("Missing X-GitHub-Event header");
  }

  const parsed = repositoryPayloadSchema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new InvalidEventPayloadError(
      "Invalid repository webhook payload",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const { action, repository } = parsed.data;
  const createdAt = repository.created_at;

  return {
    eventName,
    action,
    repositoryName: repository.name,
    ownerLogin: repository.owner?.login ?? null,
    // Push-style payloads report created_at as epoch seconds.
    createdAt:
      typeof createdAt === "number" ? new Date(createdAt * 1000).toISOString() : (createdAt ?? null)
  };
}

export function isRepositoryCreation(event: RepositoryEvent): boolean {
  return event.eventName === REPOSITORY_EVENT && event.action === "created";
}

export function signPayload(secret: string, rawBody: Buffer | string): string {
  return `${SIGNATURE_PREFIX}${createHmac("sha256", secret).update(rawBody).digest("hex")}`;
}

/**
 * Check an X-Hub-Signature-256 header against the raw request body.
 */
export function verifyWebhookSignature(
  secret: string,
  rawBody: Buffer | string,
  signatureHeader: string | undefined
): boolean {
  if (!signatureHeader || !signatureHeader.startsWith(SIGNATURE_PREFIX)) {
    return false;
  }

  const expected = Buffer.from(signPayload(secret, rawBody));
  const received = Buffer.from(signatureHeader);
  if (expected.length !== received.length) {
    return false;
  }

  return timingSafeEqual(expected, received);
}
