type PageFetchMode = 'browser' | 'http';

type RuntimePreflightReport = {
  profile: 'production' | 'non-production';
  pageFetchMode: PageFetchMode;
  providers: {
    database: boolean;
    chromeExecutable: boolean;
    textGeneration: boolean;
    sessionCookie: boolean;
  };
  warnings: string[];
};

function isProductionProfile(): boolean {
  return String(process.env.NODE_ENV || '').toLowerCase() === 'production';
}

export function getPageFetchMode(): PageFetchMode {
  const raw = String(process.env.PAGE_FETCH_MODE || 'browser').trim().toLowerCase();
  if (raw === 'browser' || raw === 'http') return raw;
  throw new Error(
    `[Preflight] Invalid PAGE_FETCH_MODE "${raw}". Expected "browser" or "http".`
  );
}

function hasValue(name: string): boolean {
  return String(process.env[name] || '').trim().length > 0;
}

export function validateRuntimePreflight(options: { pageFetching?: boolean } = {}): RuntimePreflightReport {
  const pageFetching = options.pageFetching ?? true;
  const production = isProductionProfile();
  const pageFetchMode = getPageFetchMode();
  const database = hasValue('DATABASE_URL');
  const chromeExecutable = hasValue('CHROME_EXECUTABLE_PATH');
  const textGeneration = hasValue('OPENAI_API_KEY') || hasValue('OPENAI_BASE_URL');
  const sessionCookie = hasValue('INSTAGRAM_SESSION_COOKIE');

  const warnings: string[] = [];
  const errors: string[] = [];

  if (!database) {
    errors.push('DATABASE_URL is not set.');
  }

  if (pageFetching && pageFetchMode === 'browser' && !chromeExecutable) {
    errors.push('CHROME_EXECUTABLE_PATH is required when PAGE_FETCH_MODE=browser.');
  }

  if (pageFetching && pageFetchMode === 'http' && !sessionCookie) {
    warnings.push('INSTAGRAM_SESSION_COOKIE is not set. Most pages will come back as login walls in http mode.');
  }

  // Drafting falls back to templates, so a missing model is never fatal.
  if (!textGeneration) {
    const message = 'Neither OPENAI_API_KEY nor OPENAI_BASE_URL is set. Outreach and comment drafts use template fallbacks.';
    warnings.push(production ? `${message} (production)` : message);
  }

  if (errors.length > 0) {
    throw new Error(`[Preflight] Runtime validation failed:\n- ${errors.join('\n- ')}`);
  }

  return {
    profile: production ? 'production' : 'non-production',
    pageFetchMode,
    providers: {
      database,
      chromeExecutable,
      textGeneration,
      sessionCookie,
    },
    warnings,
  };
}
