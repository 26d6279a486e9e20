import 'dotenv/config';

import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const KNOWLEDGE_DIR = path.resolve(__dirname, '..', 'knowledge');

function numberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

function boolEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) return fallback;
  return raw === 'true' || raw === '1';
}

export const config = Object.freeze({
  PORT: numberEnv('PORT', 3000),
  KNOWLEDGE_PATH: process.env.KNOWLEDGE_PATH ?? path.join(KNOWLEDGE_DIR, 'facts.json'),
  TRIAGE_RULES_PATH: process.env.TRIAGE_RULES_PATH ?? path.join(KNOWLEDGE_DIR, 'triage_rules.json'),

  // scoring
  MATCH_RED_FLAG_BASE: numberEnv('MATCH_RED_FLAG_BASE', 2),
  CONFIDENCE_SCALE: numberEnv('CONFIDENCE_SCALE', 1),
  RED_FLAG_CONFIDENCE_BOOST: numberEnv('RED_FLAG_CONFIDENCE_BOOST', 0.1),
  RED_FLAG_CONFIDENCE_CAP: numberEnv('RED_FLAG_CONFIDENCE_CAP', 0.3),
  DIFFERENTIAL_LIMIT: numberEnv('DIFFERENTIAL_LIMIT', 5),

  // result cache
  REDIS_ENABLED: boolEnv('REDIS_ENABLED', false),
  REDIS_URL: process.env.REDIS_URL,
  CACHE_TTL_SECONDS: numberEnv('CACHE_TTL_SECONDS', 300),
  CACHE_MAX_ENTRIES: numberEnv('CACHE_MAX_ENTRIES', 500),

  LOG_LEVEL: (process.env.LOG_LEVEL ?? 'info').toLowerCase(),
} as const);

export type Config = typeof config;
