import 'dotenv/config';

export interface CrmConfig {
  /** Upper bound for every outbound provider call */
  requestTimeoutMs: number;
  klaviyo: {
    baseUrl: string;
    revision: string;
  };
  salesforce: {
    apiVersion: string;
  };
  creatio: {
    odataPath: string;
  };
}

function optionalEnv(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function positiveIntEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;

  const parsed = parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid value for ${key}: expected a positive integer`);
  }
  return parsed;
}

export const crmConfig: CrmConfig = {
  requestTimeoutMs: positiveIntEnv('CRM_REQUEST_TIMEOUT_MS', 10_000),
  klaviyo: {
    baseUrl: optionalEnv('KLAVIYO_API_BASE', 'https://a.klaviyo.com/api'),
    revision: optionalEnv('KLAVIYO_API_REVISION', '2025-10-15'),
  },
  salesforce: {
    apiVersion: optionalEnv('SALESFORCE_API_VERSION', 'v60.0'),
  },
  creatio: {
    odataPath: '/0/odata',
  },
};
