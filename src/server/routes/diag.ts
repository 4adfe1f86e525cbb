import { NextResponse } from 'next/server';

import type { Env } from '../config';

/** Variables reported by GET /api/diag/env. */
export const DIAG_ENV_KEYS = [
  'PORT',
  'DATABASE_URL',
  'PG_HOST',
  'PG_PORT',
  'PG_USER',
  'PG_PASSWORD',
  'PG_DATABASE',
  'CATALOG_PATH',
  'LLM_PROVIDER',
  'LLM_MODEL',
  'LLM_API_KEY',
  'OPENAI_API_KEY',
  'ANTHROPIC_API_KEY',
  'GOOGLE_API_KEY',
  'AZURE_OPENAI_API_KEY',
  'AZURE_OPENAI_ENDPOINT',
  'AZURE_OPENAI_DEPLOYMENT',
  'AZURE_OPENAI_API_VERSION',
  'AUDIT_SINK',
] as const;

const MASKED = 'SET(***masked***)';

function isSecret(key: string): boolean {
  return /KEY|PASSWORD|SECRET/.test(key) || key === 'DATABASE_URL';
}

export function sanitizeEnv(env: Env): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of DIAG_ENV_KEYS) {
    const value = env[key];
    if (!value) {
      out[key] = 'MISSING';
    } else {
      out[key] = isSecret(key) ? MASKED : value;
    }
  }
  return out;
}

/** GET /api/diag/env */
export async function handleDiagEnv(env: Env = process.env): Promise<NextResponse> {
  return NextResponse.json(sanitizeEnv(env));
}
