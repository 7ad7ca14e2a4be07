import "dotenv/config";

export const config = {
  databaseUrl: process.env.DATABASE_URL || "postgresql://localhost:5432/crypto_alerts",
  port: Number(process.env.PORT || 3000),
  appUrl: process.env.APP_URL || "http://localhost:3000",
  smtp: {
    host: process.env.SMTP_HOST,
    port: Number(process.env.SMTP_PORT || 587),
    user: process.env.SMTP_USER,
    pass: process.env.SMTP_PASS,
  },
  mailFrom: process.env.MAIL_FROM || process.env.SMTP_USER,
  coindesk: {
    baseUrl: process.env.COINDESK_BASE_URL || "https://data-api.coindesk.com",
    apiKey: process.env.COINDESK_API_KEY,
    topListLimit: Number(process.env.COINDESK_TOPLIST_LIMIT || 100),
  },
  ingestCron: process.env.INGEST_CRON || "*/5 * * * *",
  dailySummaryCron: process.env.DAILY_SUMMARY_CRON || "0 9 * * *",
  cacheStaleMinutes: Number(process.env.CACHE_STALE_MINUTES || 5),
  ingest: {
    cycleDeadlineSeconds: Number(process.env.INGEST_CYCLE_DEADLINE_SECONDS || 60),
    maxRetries: Number(process.env.INGEST_MAX_RETRIES || 3),
    backoffMs: Number(process.env.INGEST_BACKOFF_MS || 1000),
    requestTimeoutMs: Number(process.env.INGEST_REQUEST_TIMEOUT_MS || 10_000),
  },
};

export function isEmailConfigured(): boolean {
  return !!(config.smtp.host && config.smtp.user && config.smtp.pass && config.mailFrom);
}
