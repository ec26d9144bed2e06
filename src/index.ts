import * as dotenv from "dotenv";
import { startServer } from "./server";
import { logger } from "./logger";

dotenv.config();

export { createApp, createDocSyncDeps, startServer } from "./server";
export type { ServerOptions } from "./server";
export { createFullConfig, defaultConfig } from "./config";
export { RefinementCoordinator } from "./coordinator";
export { SyncFlow } from "./sync";
export { ChangeApplier } from "./applier";
export { FileSessionStore, InMemorySessionStore, sessionKey } from "./sessionStore";
export type { SessionStore } from "./sessionStore";
export { sanitize } from "./sanitizer";
export { parseCommand } from "./parser";
export { HeuristicClassifier } from "./classifier";
export type { SignificanceClassifier } from "./classifier";
export type { VersionControlHost } from "./host";
export type { ContentGenerator, GenerationContext } from "./llm";
export type { Notifier } from "./notify";
export * from "./errors";
export type * from "./types";

// Start the server when this file is run directly
if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error("Failed to start server", {}, error);
    process.exit(1);
  });
}
