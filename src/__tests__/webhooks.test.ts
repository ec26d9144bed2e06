import { createHmac } from "node:crypto";
import { beforeEach, describe, expect, it } from "vitest";
import { createFullConfig } from "../config";
import { createApp } from "../server";
import { InMemorySessionStore, sessionKey } from "../sessionStore";
import type { DocSyncDeps } from "../webhooks";
import { parseWebhookBody, verifySignature } from "../webhooks";
import { InMemoryHost, RecordingNotifier, silentLogger, StubGenerator } from "./fakes";

const BRANCH = "docsync/update-5-1700000000000";
const repository = { name: "widgets", owner: { login: "acme" } };

const commentEvent = (body: string, user: { login: string; type?: string } = { login: "octocat", type: "User" }) => ({
  action: "created",
  issue: { number: 12, pull_request: { url: "https://api.github.com/repos/acme/widgets/pulls/12" } },
  comment: { body, user },
  repository,
});

const closedEvent = (pr: { number: number; title: string; merged: boolean; labels?: string[] }) => ({
  action: "closed",
  pull_request: {
    number: pr.number,
    title: pr.title,
    merged: pr.merged,
    base: { ref: "main" },
    labels: (pr.labels ?? []).map((name) => ({ name })),
  },
  repository,
});

describe("webhook endpoint", () => {
  let host: InMemoryHost;
  let store: InMemorySessionStore;
  let generator: StubGenerator;
  let deps: DocSyncDeps;

  const post = (event: string | undefined, payload: unknown, headers: Record<string, string> = {}) =>
    createApp(deps).request("/webhook", {
      method: "POST",
      headers: {
        "content-type": "application/json",
        ...(event ? { "x-github-event": event } : {}),
        ...headers,
      },
      body: typeof payload === "string" ? payload : JSON.stringify(payload),
    });

  beforeEach(() => {
    host = new InMemoryHost();
    host.addPullRequest({ number: 12, title: "📚 DocSync: update documentation for Add retries", headRef: BRANCH });
    host.setFile(BRANCH, "README.md", "# Widgets\n");
    store = new InMemorySessionStore();
    generator = new StubGenerator((context) => `${context.currentContent}\nMore detail.\n`);
    deps = {
      settings: createFullConfig({ botLogin: "docsync-app" }),
      store,
      generator,
      notifier: new RecordingNotifier(),
      logger: silentLogger,
      hostFor: () => host,
    };
  });

  it("reports health", async () => {
    const res = await createApp(deps).request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  it("requires the event header", async () => {
    const res = await post(undefined, { zen: "Keep it simple." });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "No GitHub event header found" });
  });

  it("answers ping, also when the body is form-encoded", async () => {
    const res = await post("ping", `payload=${encodeURIComponent(JSON.stringify({ zen: "Keep it simple." }))}`, {
      "content-type": "application/x-www-form-urlencoded",
    });

    expect(await res.json()).toEqual({ message: "pong" });
  });

  it("rejects a body that is not JSON", async () => {
    const res = await post("issue_comment", "{not json");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid webhook payload" });
  });

  it("rejects payloads that do not match the event", async () => {
    const res = await post("issue_comment", { action: "created" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid webhook payload" });
  });

  describe("issue_comment", () => {
    it("runs the command and returns the reply", async () => {
      const res = await post("issue_comment", commentEvent("@docbot reject"));

      expect(res.status).toBe(200);
      const reply =
        "ℹ️ There is nothing pending to reject. Ask for a change first, e.g. `@docbot expand installation steps`.";
      expect(await res.json()).toEqual({ message: "Command handled", reply });
      expect(host.comments).toEqual([{ threadId: 12, body: reply }]);
    });

    it("stages a proposal for a refinement command", async () => {
      await post("issue_comment", commentEvent("@docbot expand the introduction"));

      const session = await store.get(sessionKey("acme/widgets", 12));
      expect(session.pendingChange?.content).toBe("# Widgets\n\nMore detail.\n");
      expect(session.approvalState).toBe("awaiting_approval");
    });

    it("reports comments that are not commands", async () => {
      const res = await post("issue_comment", commentEvent("Looks good"));

      expect(await res.json()).toEqual({ message: "Not a command" });
      expect(host.comments).toEqual([]);
    });

    it.each([
      { login: "docsync-app[bot]", type: "Bot" },
      { login: "docsync-app", type: "User" },
    ])("skips comments by $login", async (user) => {
      const res = await post("issue_comment", commentEvent("@docbot expand the introduction", user));

      expect(await res.json()).toEqual({ message: "Skipping bot comment" });
      expect(generator.calls).toEqual([]);
    });

    it("ignores comments on plain issues and edits", async () => {
      const onIssue = { ...commentEvent("@docbot reject"), issue: { number: 12 } };
      const edited = { ...commentEvent("@docbot reject"), action: "edited" };

      expect(await (await post("issue_comment", onIssue)).json()).toEqual({ message: "Event ignored" });
      expect(await (await post("issue_comment", edited)).json()).toEqual({ message: "Event ignored" });
      expect(host.comments).toEqual([]);
    });
  });

  describe("pull_request", () => {
    it("closes the session when a DocSync pull request is closed", async () => {
      const res = await post(
        "pull_request",
        closedEvent({ number: 12, title: "Docs", merged: false, labels: ["docsync"] })
      );

      expect(await res.json()).toEqual({ message: "Session closed" });
      expect((await store.get(sessionKey("acme/widgets", 12))).closed).toBe(true);
    });

    it("opens a documentation pull request for a significant merge", async () => {
      host.addPullRequest({ number: 5, title: "Add retries", state: "closed", merged: true });
      host.setFile("main", "README.md", "# Widgets\n");
      host.diffs.set(5, [{ filename: "src/retry.ts", status: "added", patch: "+export function retry() {}" }]);

      const res = await post("pull_request", closedEvent({ number: 5, title: "Add retries", merged: true }));

      expect(await res.json()).toEqual({
        message: "Documentation PR created",
        pullRequest: expect.objectContaining({ number: 100, url: "https://github.com/acme/widgets/pull/100" }),
      });
      expect(host.labels.get(100)).toEqual(["docsync", "documentation"]);
    });

    it("needs no update when the merge only touches tests", async () => {
      host.addPullRequest({ number: 5, title: "Tidy tests", state: "closed", merged: true });
      host.diffs.set(5, [{ filename: "test/retry.test.ts", status: "modified", patch: "+it('works')" }]);

      const res = await post("pull_request", closedEvent({ number: 5, title: "Tidy tests", merged: true }));

      expect(await res.json()).toEqual({ message: "No documentation update needed" });
    });

    it("ignores pull requests closed without merging", async () => {
      const res = await post("pull_request", closedEvent({ number: 5, title: "Add retries", merged: false }));

      expect(await res.json()).toEqual({ message: "Event ignored" });
    });
  });

  it("ignores other events", async () => {
    const res = await post("push", { ref: "refs/heads/main" });

    expect(await res.json()).toEqual({ message: "Event ignored" });
  });

  it("returns 500 when handling fails", async () => {
    deps.hostFor = () => {
      throw new Error("installation not found");
    };

    const res = await post("issue_comment", commentEvent("@docbot reject"));

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "Webhook processing failed",
      details: "installation not found",
    });
  });

  describe("signatures", () => {
    const sign = (body: string) => `sha256=${createHmac("sha256", "test-secret").update(body).digest("hex")}`;

    beforeEach(() => {
      deps.webhookSecret = "test-secret";
    });

    it("accepts a correctly signed delivery", async () => {
      const body = JSON.stringify({ zen: "Keep it simple." });

      const res = await post("ping", body, { "x-hub-signature-256": sign(body) });

      expect(res.status).toBe(200);
    });

    it("rejects a missing or wrong signature", async () => {
      const body = JSON.stringify({ zen: "Keep it simple." });

      expect((await post("ping", body)).status).toBe(401);
      expect((await post("ping", body, { "x-hub-signature-256": sign(`${body} `) })).status).toBe(401);
    });

    it("compares signatures of different lengths without throwing", () => {
      expect(verifySignature("{}", "sha256=abc", "test-secret")).toBe(false);
    });
  });

  it("refuses unsupported content types", () => {
    expect(() => parseWebhookBody("zen", "text/plain")).toThrow("Unsupported content type");
  });
});
