/**
 * config.ts: Builds the one immutable `CrawlerConfig` for a process.
 *
 * The environment is validated once at startup; every component receives the
 * parts it needs by argument.  A bad or missing key is a `ConfigError` that
 * lists every problem at once (values are never echoed, so secrets stay out
 * of the log).
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import type { TrackedOrganization } from './types';

// ─── Shapes handed to components ───────────────────────────

export interface Credentials {
  username?: string;
  password?: string;
}

/** Each flag maps to one Chromium switch; `false` leaves the browser default. */
export interface BrowserLaunchOptions {
  headless: boolean;
  disableGpu: boolean;
  noSandbox: boolean;
  disableSharedMemory: boolean;
  executablePath?: string;
}

export interface LoginOptions {
  url: string;
  /** Substring the post-login location must contain. */
  loggedInPattern: string;
  waitTimeoutMs: number;
}

export interface CrawlOptions {
  resultCap: number;
  maxRevealSteps: number;
  settleDelayMs: number;
  waitTimeoutMs: number;
}

export interface SupabaseSettings {
  url: string;
  serviceRoleKey: string;
}

export interface CrawlerConfig {
  credentials: Credentials;
  login: LoginOptions;
  browser: BrowserLaunchOptions;
  crawl: CrawlOptions;
  trackedOrganizations: TrackedOrganization[];
  supabase?: SupabaseSettings;
}

// ─── Environment schema ────────────────────────────────────

const flag = z
  .string()
  .default('true')
  .transform((v) => v.trim().toLowerCase() === 'true');

const trackedOrganizationsSchema = z.array(
  z.object({
    name: z.string().min(1),
    url: z.string().url(),
  }),
);

const envSchema = z.object({
  NETWORK_USERNAME: z.string().min(1),
  NETWORK_PASSWORD: z.string().min(1),
  LOGIN_URL: z.string().url().default('https://www.linkedin.com/login'),
  LOGGED_IN_URL_PATTERN: z.string().min(1).default('/feed'),
  MAX_RESULTS_PER_ORGANIZATION: z.coerce.number().int().positive().default(100),
  MAX_REVEAL_STEPS: z.coerce.number().int().positive().default(5),
  SCRAPING_DELAY: z.coerce.number().nonnegative().default(2),
  WAIT_TIMEOUT: z.coerce.number().positive().default(10),
  TRACKED_ORGANIZATIONS: z
    .string()
    .default('[]')
    .transform((raw, ctx) => {
      try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a JSON array' });
        return z.NEVER;
      }
    })
    .pipe(trackedOrganizationsSchema),
  HEADLESS: flag,
  DISABLE_GPU: flag,
  NO_SANDBOX: flag,
  DISABLE_SHARED_MEMORY: flag,
  BROWSER_EXECUTABLE_PATH: z.string().min(1).optional(),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
});

/**
 * Validate `env` and build the config.
 *
 * @throws ConfigError listing every invalid key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CrawlerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  const waitTimeoutMs = Math.round(e.WAIT_TIMEOUT * 1000);

  return {
    credentials: {
      username: e.NETWORK_USERNAME,
      password: e.NETWORK_PASSWORD,
    },
    login: {
      url: e.LOGIN_URL,
      loggedInPattern: e.LOGGED_IN_URL_PATTERN,
      waitTimeoutMs,
    },
    browser: {
      headless: e.HEADLESS,
      disableGpu: e.DISABLE_GPU,
      noSandbox: e.NO_SANDBOX,
      disableSharedMemory: e.DISABLE_SHARED_MEMORY,
      executablePath: e.BROWSER_EXECUTABLE_PATH,
    },
    crawl: {
      resultCap: e.MAX_RESULTS_PER_ORGANIZATION,
      maxRevealSteps: e.MAX_REVEAL_STEPS,
      settleDelayMs: Math.round(e.SCRAPING_DELAY * 1000),
      waitTimeoutMs,
    },
    trackedOrganizations: e.TRACKED_ORGANIZATIONS.map((org) => ({
      name: org.name,
      sourceUrl: org.url,
      active: true,
    })),
    supabase:
      e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
        ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
        : undefined,
  };
}

/** The CLI cannot run without a store; library callers may bring their own. */
export function requireSupabase(config: CrawlerConfig): SupabaseSettings {
  if (!config.supabase) {
    throw new ConfigError([
      'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must both be set',
    ]);
  }
  return config.supabase;
}
