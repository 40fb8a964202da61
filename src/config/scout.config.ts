import { registerAs } from '@nestjs/config';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const STORE_DRIVERS = ['sqlite', 'supabase'] as const;
export type StoreDriver = (typeof STORE_DRIVERS)[number];

export interface ScoutConfig {
  storeDriver: StoreDriver;
  dbPath: string;
  legacyCsvPath: string;
  draftsDir: string;
  briefsDir: string;
  nameMatchThreshold: number;
  enrichConcurrency: number;
  fetchTimeoutMs: number;
  httpPort: number;
  serpApiKey: string | null;
  braveApiKey: string | null;
  openAiApiKey: string | null;
  openAiModel: string;
  supabaseUrl: string | null;
  supabaseServiceRoleKey: string | null;
}

/**
 * Shape of the raw environment after string → number coercion.
 * Validated once at startup; nothing downstream reads process.env.
 */
class ScoutEnvironment {
  @IsIn(STORE_DRIVERS)
  storeDriver: string;

  @IsString()
  @IsNotEmpty()
  dbPath: string;

  @IsString()
  @IsNotEmpty()
  legacyCsvPath: string;

  @IsString()
  @IsNotEmpty()
  draftsDir: string;

  @IsString()
  @IsNotEmpty()
  briefsDir: string;

  @IsNumber()
  @Min(0)
  @Max(1)
  nameMatchThreshold: number;

  @IsInt()
  @Min(1)
  @Max(64)
  enrichConcurrency: number;

  @IsInt()
  @Min(1)
  fetchTimeoutMs: number;

  @IsInt()
  @Min(1)
  @Max(65535)
  httpPort: number;

  @IsOptional()
  @IsString()
  openAiModel?: string;

  constructor(env: NodeJS.ProcessEnv) {
    this.storeDriver = (env.SCOUT_STORE_DRIVER ?? 'sqlite').trim().toLowerCase();
    this.dbPath = env.SCOUT_DB_PATH ?? 'data/scout.db';
    this.legacyCsvPath = env.SCOUT_LEGACY_CSV_PATH ?? 'data/leads.csv';
    this.draftsDir = env.SCOUT_DRAFTS_DIR ?? 'outreach_drafts';
    this.briefsDir = env.SCOUT_BRIEFS_DIR ?? 'call_briefs';
    this.nameMatchThreshold = numberOr(env.SCOUT_NAME_MATCH_THRESHOLD, 0.9);
    this.enrichConcurrency = numberOr(env.SCOUT_ENRICH_CONCURRENCY, 4);
    this.fetchTimeoutMs = numberOr(env.SCOUT_FETCH_TIMEOUT_MS, 20_000);
    this.httpPort = numberOr(env.SCOUT_HTTP_PORT, 3000);
    this.openAiModel = env.OPENAI_MODEL;
  }
}

function numberOr(raw: string | undefined, fallback: number): number {
  if (raw == null || raw.trim() === '') return fallback;
  return Number(raw);
}

function optional(raw: string | undefined): string | null {
  const value = raw?.trim();
  return value ? value : null;
}

function isStoreDriver(value: string): value is StoreDriver {
  return (STORE_DRIVERS as readonly string[]).includes(value);
}

export function loadScoutConfig(env: NodeJS.ProcessEnv): ScoutConfig {
  const parsed = new ScoutEnvironment(env);
  const errors = validateSync(parsed);

  if (errors.length > 0) {
    const messages = errors.flatMap((e) => Object.values(e.constraints ?? {}));
    throw new Error(`Invalid scout configuration: ${messages.join('; ')}`);
  }
  if (!isStoreDriver(parsed.storeDriver)) {
    throw new Error(`Invalid scout configuration: unknown store driver ${parsed.storeDriver}`);
  }

  return {
    storeDriver: parsed.storeDriver,
    dbPath: parsed.dbPath,
    legacyCsvPath: parsed.legacyCsvPath,
    draftsDir: parsed.draftsDir,
    briefsDir: parsed.briefsDir,
    nameMatchThreshold: parsed.nameMatchThreshold,
    enrichConcurrency: parsed.enrichConcurrency,
    fetchTimeoutMs: parsed.fetchTimeoutMs,
    httpPort: parsed.httpPort,
    serpApiKey: optional(env.SERPAPI_API_KEY),
    braveApiKey: optional(env.BRAVE_SEARCH_API_KEY),
    openAiApiKey: optional(env.OPENAI_API_KEY),
    openAiModel: optional(parsed.openAiModel) ?? 'gpt-4o-mini',
    supabaseUrl: optional(env.SUPABASE_URL),
    supabaseServiceRoleKey: optional(env.SUPABASE_SERVICE_ROLE_KEY),
  };
}

export const scoutConfig = registerAs('scout', (): ScoutConfig => loadScoutConfig(process.env));
