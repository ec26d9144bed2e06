import type { Logger } from "./logger";

export interface Notifier {
  notify(message: string): Promise<void>;
}

export class NoopNotifier implements Notifier {
  async notify(): Promise<void> {}
}

const SLACK_API_BASE = "https://slack.com/api";

export type SlackTarget =
  | { kind: "webhook"; url: string }
  | { kind: "bot"; token: string; channel: string };

export class SlackNotifier implements Notifier {
  constructor(
    private readonly target: SlackTarget,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async notify(message: string): Promise<void> {
    if (this.target.kind === "webhook") {
      const response = await this.fetchImpl(this.target.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ text: message }),
      });
      if (!response.ok) {
        throw new Error(`Slack webhook error: ${response.status}`);
      }
      return;
    }

    const response = await this.fetchImpl(`${SLACK_API_BASE}/chat.postMessage`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.target.token}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({ channel: this.target.channel, text: message }),
    });
    const data: unknown = await response.json();
    if (typeof data !== "object" || data === null || !("ok" in data) || data.ok !== true) {
      const error = typeof data === "object" && data !== null && "error" in data ? data.error : response.status;
      throw new Error(`Slack API error: ${String(error)}`);
    }
  }
}

export function createNotifier(env: {
  webhookUrl?: string;
  botToken?: string;
  channel?: string;
}): Notifier {
  if (env.webhookUrl) {
    return new SlackNotifier({ kind: "webhook", url: env.webhookUrl });
  }
  if (env.botToken && env.channel) {
    return new SlackNotifier({ kind: "bot", token: env.botToken, channel: env.channel });
  }
  return new NoopNotifier();
}

/** Fire-and-forget: notification failures are logged and never reach the caller. */
export function notifyInBackground(notifier: Notifier, message: string, logger: Logger): void {
  notifier.notify(message).catch((error: unknown) => {
    logger.warn("Notification failed", { message }, error);
  });
}
