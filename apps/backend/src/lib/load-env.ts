import dotenv from 'dotenv';
import path from 'path';

export type EnvLoadReport = {
  profile: 'production' | 'non-production';
  backendEnvOverride: boolean;
  hadPreexistingDatabaseUrl: boolean;
  rootEnvPath: string;
  backendEnvPath: string;
};

function getProfile(): 'production' | 'non-production' {
  return String(process.env.NODE_ENV || '').toLowerCase() === 'production'
    ? 'production'
    : 'non-production';
}

/**
 * Load env deterministically:
 * 1. Repo root fallback (no override)
 * 2. Backend env (override in non-production)
 */
export function loadBackendEnv(): EnvLoadReport {
  const profile = getProfile();
  const backendEnvOverride = profile !== 'production';
  const hadPreexistingDatabaseUrl = Boolean(String(process.env.DATABASE_URL || '').trim());

  const rootEnvPath = path.resolve(__dirname, '../../../../.env');
  const backendEnvPath = path.resolve(__dirname, '../../.env');

  dotenv.config({ path: rootEnvPath, override: false });
  dotenv.config({ path: backendEnvPath, override: backendEnvOverride });

  return {
    profile,
    backendEnvOverride,
    hadPreexistingDatabaseUrl,
    rootEnvPath,
    backendEnvPath,
  };
}

/** Positive numeric env value, or the fallback when missing/not finite. */
export function readNumberEnv(name: string, fallback: number, min = 0): number {
  const raw = String(process.env[name] ?? '').trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) return fallback;
  return Math.max(min, value);
}

export function readBooleanEnv(name: string, fallback: boolean): boolean {
  const raw = String(process.env[name] ?? '').trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  return fallback;
}
