import { z } from "zod";
import type { DocSyncConfig, DocSyncSettings } from "./types";

export const defaultConfig: Required<Omit<DocSyncConfig, "botLogin" | "styleGuide">> = {
  allowList: ["README.md", "CLAUDE.md"],
  botHandles: ["docbot", "docsync"],
  legacyPrefix: "docsync:",
  minFeedbackLength: 10,
  maxCommentLength: 4000,
  docSyncLabel: "docsync",
  titleMarker: "📚 DocSync",
  branchPrefix: "docsync/update",
  labels: ["documentation"],
  llmProvider: "openai",
  model: "gpt-4o-mini",
  temperature: 0.3,
  generationTimeoutMs: 120_000,
  commitTimeoutMs: 30_000,
  sessionsDir: ".docsync/sessions",
  lockStaleMs: 300_000,
};

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  BOT_LOGIN: z.string().min(1).optional(),
  LLM_PROVIDER: z.enum(["openai", "groq"]).optional(),
  OPENAI_MODEL: z.string().min(1).optional(),
  GROQ_MODEL: z.string().min(1).optional(),
  DOCSYNC_SESSIONS_DIR: z.string().min(1).optional(),
  DOCSYNC_GENERATION_TIMEOUT_MS: positiveInt.optional(),
  DOCSYNC_COMMIT_TIMEOUT_MS: positiveInt.optional(),
  DOCSYNC_STYLE_GUIDE: z.string().optional(),
});

export type EnvOverrides = z.infer<typeof envSchema>;

// Empty strings in .env files mean "unset"
function cleanEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): DocSyncConfig {
  const parsed = envSchema.safeParse(cleanEnv(env));
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const vars = parsed.data;
  const provider = vars.LLM_PROVIDER;
  const model = provider === "groq" ? vars.GROQ_MODEL : vars.OPENAI_MODEL;

  const overrides: DocSyncConfig = {};
  if (vars.BOT_LOGIN) overrides.botLogin = vars.BOT_LOGIN;
  if (provider) overrides.llmProvider = provider;
  if (model) overrides.model = model;
  if (provider === "groq" && !model) overrides.model = "llama-3.3-70b-versatile";
  if (vars.DOCSYNC_SESSIONS_DIR) overrides.sessionsDir = vars.DOCSYNC_SESSIONS_DIR;
  if (vars.DOCSYNC_GENERATION_TIMEOUT_MS) {
    overrides.generationTimeoutMs = vars.DOCSYNC_GENERATION_TIMEOUT_MS;
  }
  if (vars.DOCSYNC_COMMIT_TIMEOUT_MS) overrides.commitTimeoutMs = vars.DOCSYNC_COMMIT_TIMEOUT_MS;
  if (vars.DOCSYNC_STYLE_GUIDE) overrides.styleGuide = vars.DOCSYNC_STYLE_GUIDE;
  return overrides;
}

// Handles are compared without "@" and case-insensitively
const normalizeHandles = (handles: string[]): string[] => {
  return [
    ...new Set(
      handles
        .map((handle) => handle.trim().replace(/^@/, "").toLowerCase())
        .filter((handle) => handle.length > 0)
    ),
  ];
};

export function createFullConfig(userConfig: Partial<DocSyncConfig> = {}): DocSyncSettings {
  const config = { ...defaultConfig, ...userConfig };

  if (config.allowList.length === 0) {
    throw new Error("allowList must name at least one documentation file");
  }
  const botHandles = normalizeHandles(config.botHandles);
  if (botHandles.length === 0) {
    throw new Error("At least one bot handle is required");
  }

  return {
    allowList: [...new Set(config.allowList)],
    addressing: {
      botHandles,
      legacyPrefix: config.legacyPrefix.trim().toLowerCase(),
      botLogin: config.botLogin,
    },
    sanitizer: {
      minFeedbackLength: config.minFeedbackLength,
      maxCommentLength: config.maxCommentLength,
    },
    origin: {
      label: config.docSyncLabel,
      titleMarker: config.titleMarker,
    },
    prConfig: {
      branchPrefix: config.branchPrefix,
      titleTemplate: `${config.titleMarker}: update documentation for {prTitle}`,
      bodyTemplate: `This PR updates documentation to reflect changes merged in #{prNumber}.

## Changes
{changes}

Comment \`@${botHandles[0]} <update|clarify|add|expand|fix> <what>\` to refine the text, then \`@${botHandles[0]} approve\` or \`@${botHandles[0]} reject\`.`,
      labels: [...new Set([config.docSyncLabel, ...config.labels])],
    },
    llmConfig: {
      provider: config.llmProvider,
      model: config.model,
      temperature: config.temperature,
      styleGuide: config.styleGuide,
    },
    timeouts: {
      generationMs: config.generationTimeoutMs,
      commitMs: config.commitTimeoutMs,
    },
    storage: {
      sessionsDir: config.sessionsDir,
      lockStaleMs: config.lockStaleMs,
    },
  };
}
