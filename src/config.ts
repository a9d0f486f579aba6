import "dotenv/config";

export class ConfigError extends Error {
  constructor(readonly missing: string[]) {
    super(`Missing required settings: ${missing.join(", ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  return {
    databaseUrl: env.DATABASE_URL || "",
    telegram: {
      botToken: env.TELEGRAM_TOKEN || "",
      chatId: env.TELEGRAM_CHAT_ID || "",
    },
    market: {
      timeZone: env.MARKET_TIMEZONE || "Asia/Kolkata",
      defaultSuffix: env.DEFAULT_EXCHANGE_SUFFIX || ".NS",
    },
    checkIntervalCron: env.CHECK_INTERVAL_CRON || "*/5 9-15 * * 1-5",
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config = loadConfig();

export function missingSettings(cfg: AppConfig): string[] {
  const missing: string[] = [];
  if (!cfg.telegram.botToken) missing.push("TELEGRAM_TOKEN");
  if (!cfg.telegram.chatId) missing.push("TELEGRAM_CHAT_ID");
  if (!cfg.databaseUrl) missing.push("DATABASE_URL");
  return missing;
}

export function assertConfigured(cfg: AppConfig = config): void {
  const missing = missingSettings(cfg);
  if (missing.length > 0) throw new ConfigError(missing);
}
