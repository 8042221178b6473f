import "dotenv/config";
import path from "path";
import { ConfigError } from "./errors.js";

type Env = Record<string, string | undefined>;

function required(env: Env, key: string): string {
  const val = env[key];
  if (!val) throw new ConfigError(`Missing required env var: ${key}`);
  return val;
}

function optional(env: Env, key: string, fallback = ""): string {
  return env[key] || fallback;
}

function integer(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (!raw) return fallback;
  const val = Number(raw);
  if (!Number.isInteger(val)) {
    throw new ConfigError(`Env var ${key} must be an integer, got "${raw}"`);
  }
  return val;
}

function flag(env: Env, key: string): boolean {
  return (env[key] || "").toLowerCase() === "true";
}

// SLACK_USER_MAP_JSON: {"Tanaka":"U0123...","Sato":"U0456..."}
function userMap(env: Env): Record<string, string> {
  const raw = env.SLACK_USER_MAP_JSON;
  if (!raw) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError("SLACK_USER_MAP_JSON is not valid JSON");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError("SLACK_USER_MAP_JSON must be a JSON object of name → Slack user id");
  }
  const map: Record<string, string> = {};
  for (const [name, id] of Object.entries(parsed)) {
    if (typeof id === "string") map[name] = id;
  }
  return map;
}

export type ReminderPolicyName = "due" | "delay";

function reminderPolicy(env: Env): ReminderPolicyName {
  const raw = optional(env, "REMIND_POLICY", "due");
  if (raw !== "due" && raw !== "delay") {
    throw new ConfigError(`REMIND_POLICY must be "due" or "delay", got "${raw}"`);
  }
  return raw;
}

function webhookBaseUrl(env: Env): string {
  const explicit = optional(env, "WEBHOOK_BASE_URL");
  if (explicit) return explicit.replace(/\/+$/, "");
  // App Service exposes the public host name
  const host = optional(env, "WEBSITE_HOSTNAME");
  return host ? `https://${host}` : "";
}

export function loadConfig(env: Env = process.env) {
  const remindHour = integer(env, "DEFAULT_REMIND_HOUR", 10);
  if (remindHour < 0 || remindHour > 23) {
    throw new ConfigError("DEFAULT_REMIND_HOUR must be between 0 and 23");
  }
  const pollInterval = integer(env, "GOOGLE_DRIVE_POLL_INTERVAL", 60);
  if (pollInterval <= 0) {
    throw new ConfigError("GOOGLE_DRIVE_POLL_INTERVAL must be positive");
  }

  return {
    port: integer(env, "PORT", 8000),
    dataDir: path.resolve(optional(env, "DATA_DIR", "data")),
    openai: {
      apiKey: required(env, "OPENAI_API_KEY"),
      model: optional(env, "OPENAI_MODEL", "gpt-4o-mini"),
      transcribeModel: optional(env, "OPENAI_TRANSCRIBE_MODEL", "whisper-1"),
    },
    slack: {
      botToken: required(env, "SLACK_BOT_TOKEN"),
      signingSecret: required(env, "SLACK_SIGNING_SECRET"),
      defaultChannelId: optional(env, "SLACK_CHANNEL_ID"),
      userMap: userMap(env),
    },
    reminders: {
      defaultHour: remindHour,
      timeZone: optional(env, "REMIND_TIMEZONE", "Asia/Tokyo"),
      policy: reminderPolicy(env),
      delayMinutes: integer(env, "REMIND_DELAY_MINUTES", 3),
    },
    mail: {
      user: optional(env, "GMAIL_USER"),
      pass: optional(env, "GMAIL_PASS"),
      to: optional(env, "MAIL_TO", optional(env, "GMAIL_USER")),
    },
    google: {
      serviceAccountJson: optional(env, "GOOGLE_SERVICE_ACCOUNT_JSON"),
      serviceAccountPath: optional(env, "GOOGLE_SERVICE_ACCOUNT_PATH"),
      uploadFolderId: optional(env, "GOOGLE_DRIVE_FOLDER_ID"),
    },
    watch: {
      enabled: flag(env, "GOOGLE_DRIVE_WATCH_ENABLED"),
      folderId: optional(env, "NOTTA_DRIVE_FOLDER_ID"),
      webhookSecret: optional(env, "GOOGLE_DRIVE_WEBHOOK_SECRET"),
      pollIntervalSeconds: pollInterval,
      webhookBaseUrl: webhookBaseUrl(env),
    },
    pdf: {
      fontPath: optional(env, "PDF_FONT_PATH"),
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;
