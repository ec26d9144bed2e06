import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { createFullConfig, readEnvOverrides } from "./config";
import { createGitHubHost } from "./host/github";
import { createContentGenerator } from "./llm/factory";
import { createLogger } from "./logger";
import type { Logger } from "./logger";
import { createNotifier } from "./notify";
import { FileSessionStore } from "./sessionStore";
import type { DocSyncConfig } from "./types";
import { handleWebhook } from "./webhooks";
import type { DocSyncDeps } from "./webhooks";

export interface ServerOptions {
  config?: Partial<DocSyncConfig>;
  githubToken?: string;
  openAiKey?: string;
  groqKey?: string;
  webhookSecret?: string;
  port?: number;
  logger?: Logger;
}

export function createDocSyncDeps(options: ServerOptions = {}): DocSyncDeps {
  const settings = createFullConfig({ ...readEnvOverrides(), ...options.config });
  const logger = options.logger ?? createLogger("docsync");

  // Validate required credentials
  const githubToken = options.githubToken || process.env.GITHUB_TOKEN;
  if (!githubToken) throw new Error("GitHub token is required");

  const generator = createContentGenerator(
    settings.llmConfig,
    {
      openAiKey: options.openAiKey || process.env.OPENAI_API_KEY,
      groqKey: options.groqKey || process.env.GROQ_API_KEY,
    },
    settings.timeouts.generationMs
  );

  return {
    settings,
    store: new FileSessionStore({
      directory: settings.storage.sessionsDir,
      lockStaleMs: settings.storage.lockStaleMs,
    }),
    generator,
    notifier: createNotifier({
      webhookUrl: process.env.SLACK_WEBHOOK_URL,
      botToken: process.env.SLACK_BOT_TOKEN,
      channel: process.env.SLACK_CHANNEL,
    }),
    logger,
    hostFor: (owner, repo) => createGitHubHost(owner, repo, githubToken),
    webhookSecret: options.webhookSecret || process.env.GITHUB_WEBHOOK_SECRET || undefined,
  };
}

export function createApp(deps: DocSyncDeps): Hono {
  const app = new Hono();

  // Single webhook endpoint
  app.post("/webhook", (c) => handleWebhook(c, deps));

  app.get("/health", (c) => {
    return c.json({ status: "ok" });
  });

  return app;
}

export async function startServer(options: ServerOptions = {}) {
  const deps = createDocSyncDeps(options);
  const app = createApp(deps);

  const port = options.port || parseInt(process.env.PORT || "3000", 10);
  const server = serve({
    fetch: app.fetch,
    port,
  });

  deps.logger.info(`🚀 Server running at http://localhost:${port}`, {
    provider: deps.settings.llmConfig.provider,
    allowList: deps.settings.allowList,
  });

  return { app, server };
}
