import 'dotenv/config';

function required(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required env var: ${name}. Copy .env.example to .env and fill in your values.`);
  }
  return value;
}

function optional(name: string, fallback: string): string {
  return process.env[name] || fallback;
}

function optionalInt(name: string, fallback: number): number {
  const val = process.env[name];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Env var ${name} must be an integer, got "${val}"`);
  }
  return parsed;
}

export function loadConfig() {
  // Tracker needs exactly one organization scope: a Yandex 360 org or a Cloud org
  const orgId = process.env.TRACKER_ORG_ID || null;
  const cloudOrgId = process.env.TRACKER_CLOUD_ORG_ID || null;
  if (!orgId && !cloudOrgId) {
    throw new Error('Missing required env var: TRACKER_ORG_ID (or TRACKER_CLOUD_ORG_ID)');
  }

  return {
    telegram: {
      token: required('TELEGRAM_BOT_TOKEN'),
    },
    tracker: {
      token: required('TRACKER_TOKEN'),
      orgId,
      cloudOrgId,
      apiUrl: optional('TRACKER_API_URL', 'https://api.tracker.yandex.net/v2'),
      timeoutMs: optionalInt('TRACKER_TIMEOUT_MS', 10_000),
    },
    routingPath: optional('ROUTING_CONFIG', 'config/routing.json'),
    dbPath: process.env.DB_PATH || null,
    webhook: {
      port: optionalInt('WEBHOOK_PORT', 8443),
      secret: process.env.WEBHOOK_SECRET || null,
      statusApiToken: process.env.STATUS_API_TOKEN || null,
    },
    reconcileConcurrency: optionalInt('RECONCILE_CONCURRENCY', 4),
    logLevel: optional('LOG_LEVEL', 'info'),
  } as const;
}

export type Config = ReturnType<typeof loadConfig>;
