import { createHmac, timingSafeEqual } from "node:crypto";
import type { Context } from "hono";
import { z } from "zod";
import type { SignificanceClassifier } from "./classifier";
import { RefinementCoordinator } from "./coordinator";
import { isDocSyncPullRequest } from "./host";
import type { VersionControlHost } from "./host";
import type { ContentGenerator } from "./llm";
import type { Logger } from "./logger";
import type { Notifier } from "./notify";
import { sessionKey } from "./sessionStore";
import type { SessionStore } from "./sessionStore";
import { SyncFlow } from "./sync";
import type { DocSyncSettings } from "./types";

export interface DocSyncDeps {
  settings: DocSyncSettings;
  store: SessionStore;
  generator: ContentGenerator;
  notifier: Notifier;
  logger: Logger;
  hostFor(owner: string, repo: string): VersionControlHost;
  classifier?: SignificanceClassifier;
  webhookSecret?: string;
}

const repositorySchema = z.object({
  name: z.string(),
  owner: z.object({ login: z.string() }),
});

const issueCommentSchema = z.object({
  action: z.string(),
  issue: z.object({
    number: z.number().int().positive(),
    pull_request: z.object({}).passthrough().optional(),
  }),
  comment: z.object({
    body: z.string().nullable(),
    user: z.object({ login: z.string(), type: z.string().optional() }),
  }),
  repository: repositorySchema,
});

const pullRequestSchema = z.object({
  action: z.string(),
  pull_request: z.object({
    number: z.number().int().positive(),
    title: z.string(),
    merged: z.boolean().nullable().optional(),
    base: z.object({ ref: z.string() }),
    labels: z.array(z.object({ name: z.string() })).default([]),
  }),
  repository: repositorySchema,
});

export function verifySignature(payload: string, signature: string | undefined, secret: string): boolean {
  if (!signature) return false;
  const expected = `sha256=${createHmac("sha256", secret).update(payload).digest("hex")}`;
  const given = Buffer.from(signature);
  const wanted = Buffer.from(expected);
  return given.length === wanted.length && timingSafeEqual(given, wanted);
}

export function parseWebhookBody(raw: string, contentType: string): unknown {
  if (contentType.includes("application/json")) {
    return JSON.parse(raw);
  }

  if (contentType.includes("application/x-www-form-urlencoded")) {
    const payload = new URLSearchParams(raw).get("payload");
    if (payload !== null) {
      return JSON.parse(payload);
    }
  }

  throw new Error("Unsupported content type");
}

function isFromBot(user: { login: string; type?: string }, settings: DocSyncSettings): boolean {
  return user.type === "Bot" || user.login === settings.addressing.botLogin;
}

async function handleIssueComment(c: Context, body: unknown, deps: DocSyncDeps) {
  const parsed = issueCommentSchema.safeParse(body);
  if (!parsed.success) {
    deps.logger.warn("Invalid issue_comment payload", { issues: parsed.error.issues.length });
    return c.json({ error: "Invalid webhook payload" }, 400);
  }

  const { action, issue, comment, repository } = parsed.data;
  if (action !== "created" || !issue.pull_request) {
    return c.json({ message: "Event ignored" });
  }
  if (isFromBot(comment.user, deps.settings)) {
    return c.json({ message: "Skipping bot comment" });
  }

  const coordinator = new RefinementCoordinator({
    host: deps.hostFor(repository.owner.login, repository.name),
    store: deps.store,
    generator: deps.generator,
    settings: deps.settings,
    logger: deps.logger.child("coordinator"),
    notifier: deps.notifier,
  });

  const reply = await coordinator.handleCommentEvent(issue.number, comment.body ?? "", comment.user.login);
  return c.json(reply === null ? { message: "Not a command" } : { message: "Command handled", reply });
}

async function handlePullRequest(c: Context, body: unknown, deps: DocSyncDeps) {
  const parsed = pullRequestSchema.safeParse(body);
  if (!parsed.success) {
    deps.logger.warn("Invalid pull_request payload", { issues: parsed.error.issues.length });
    return c.json({ error: "Invalid webhook payload" }, 400);
  }

  const { action, pull_request: pr, repository } = parsed.data;
  if (action !== "closed") {
    return c.json({ message: "Event ignored" });
  }

  const host = deps.hostFor(repository.owner.login, repository.name);
  const docSync = isDocSyncPullRequest(
    { title: pr.title, labels: pr.labels.map((label) => label.name) },
    deps.settings.origin
  );

  if (docSync) {
    await deps.store.markClosed(sessionKey(host.repository, pr.number));
    deps.logger.info("DocSync pull request closed, session is now inert", { number: pr.number });
    return c.json({ message: "Session closed" });
  }

  if (!pr.merged) {
    return c.json({ message: "Event ignored" });
  }

  const files = await host.getPullRequestDiff(pr.number);
  const sync = new SyncFlow({
    host,
    generator: deps.generator,
    settings: deps.settings,
    logger: deps.logger.child("sync"),
    classifier: deps.classifier,
    notifier: deps.notifier,
  });
  const created = await sync.handleMergeEvent(pr.number, {
    title: pr.title,
    baseRef: pr.base.ref,
    files,
  });

  return c.json(
    created
      ? { message: "Documentation PR created", pullRequest: created }
      : { message: "No documentation update needed" }
  );
}

export async function handleWebhook(c: Context, deps: DocSyncDeps) {
  try {
    const event = c.req.header("x-github-event");
    if (!event) {
      deps.logger.warn("No GitHub event header found");
      return c.json({ error: "No GitHub event header found" }, 400);
    }

    const raw = await c.req.text();
    if (deps.webhookSecret && !verifySignature(raw, c.req.header("x-hub-signature-256"), deps.webhookSecret)) {
      deps.logger.warn("Webhook signature mismatch", { event });
      return c.json({ error: "Invalid signature" }, 401);
    }

    let body: unknown;
    try {
      body = parseWebhookBody(raw, c.req.header("content-type") ?? "");
    } catch (error) {
      deps.logger.warn("Unreadable webhook body", { event }, error);
      return c.json({ error: "Invalid webhook payload" }, 400);
    }

    switch (event) {
      case "ping":
        return c.json({ message: "pong" });
      case "issue_comment":
        return await handleIssueComment(c, body, deps);
      case "pull_request":
        return await handlePullRequest(c, body, deps);
      default:
        deps.logger.debug("Event ignored", { event });
        return c.json({ message: "Event ignored" });
    }
  } catch (error) {
    deps.logger.error("Webhook error", {}, error);
    return c.json(
      {
        error: "Webhook processing failed",
        details: error instanceof Error ? error.message : String(error),
      },
      500
    );
  }
}
