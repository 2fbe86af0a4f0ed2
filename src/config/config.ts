// ============================================
// Profile Agent Configuration
// ============================================

/** Connection settings for one chat provider role. */
export interface ProviderConfig {
  /** LLM provider: openai | google */
  provider: string;

  /** API key for the provider; empty selects the placeholder provider */
  apiKey: string;

  /** Model identifier (e.g. gpt-4o-mini) */
  model: string;

  /** Override for the provider's OpenAI-compatible base URL */
  baseUrl: string;
}

export interface ProfileAgentConfig {
  /** Name of the person the agent represents */
  profileName: string;

  /** Plain-text summary of the person's background */
  summaryPath: string;

  /** Profile document: a PDF, or any plain-text file */
  profileDocumentPath: string;

  /** Model that answers, with tool access */
  primary: ProviderConfig;

  /** Model that rewrites a rejected reply, without tools */
  secondary: ProviderConfig;

  /** Model that judges candidate replies */
  evaluator: ProviderConfig;

  pushoverToken: string;
  pushoverUser: string;

  /** Tool rounds allowed before a plain answer is forced */
  maxToolRounds: number;

  /** Deadline for each provider call in milliseconds */
  llmTimeoutMs: number;
}

const DEFAULT_PROFILE_NAME = "Profile Owner";
const DEFAULT_SUMMARY_PATH = "me/summary.txt";
const DEFAULT_PROFILE_DOCUMENT_PATH = "me/profile.pdf";
const DEFAULT_PRIMARY_PROVIDER = "openai";
const DEFAULT_PRIMARY_MODEL = "gpt-4o-mini";
const DEFAULT_SECONDARY_PROVIDER = "google";
const DEFAULT_SECONDARY_MODEL = "gemini-2.0-flash";
const DEFAULT_MAX_TOOL_ROUNDS = 10;
const DEFAULT_LLM_TIMEOUT_MS = 60_000;

const VENDOR_DEFAULTS: Record<string, { apiKeyVar: string; model: string }> = {
  openai: { apiKeyVar: "OPENAI_API_KEY", model: DEFAULT_PRIMARY_MODEL },
  google: { apiKeyVar: "GOOGLE_API_KEY", model: DEFAULT_SECONDARY_MODEL },
};

/**
 * Load configuration from environment variables.
 * Call dotenv.config() before invoking this function.
 */
export function loadConfig(): ProfileAgentConfig {
  const secondary = providerConfig("SECONDARY_LLM", vendorDefaults(DEFAULT_SECONDARY_PROVIDER));

  return {
    profileName: env("PROFILE_NAME", DEFAULT_PROFILE_NAME),
    summaryPath: env("PROFILE_SUMMARY_PATH", DEFAULT_SUMMARY_PATH),
    profileDocumentPath: env("PROFILE_DOCUMENT_PATH", DEFAULT_PROFILE_DOCUMENT_PATH),
    primary: providerConfig("PRIMARY_LLM", vendorDefaults(DEFAULT_PRIMARY_PROVIDER)),
    secondary,
    // The evaluator shares the secondary's backend unless configured apart
    evaluator: providerConfig("EVALUATOR_LLM", secondary),
    pushoverToken: env("PUSHOVER_TOKEN", ""),
    pushoverUser: env("PUSHOVER_USER", ""),
    maxToolRounds: envInt("MAX_TOOL_ROUNDS", DEFAULT_MAX_TOOL_ROUNDS),
    llmTimeoutMs: envInt("LLM_TIMEOUT_MS", DEFAULT_LLM_TIMEOUT_MS),
  };
}

/** Key (from the vendor's own variable) and default model for a provider. */
function vendorDefaults(provider: string): ProviderConfig {
  const vendor = VENDOR_DEFAULTS[provider.toLowerCase()];
  return {
    provider,
    apiKey: vendor ? env(vendor.apiKeyVar, "") : "",
    model: vendor ? vendor.model : "",
    baseUrl: "",
  };
}

/**
 * Read `<prefix>_PROVIDER`, `_API_KEY`, `_MODEL` and `_BASE_URL`.
 * `fallback` fills the unset keys only while the provider matches it;
 * a role switched to another provider starts from that vendor's defaults.
 */
function providerConfig(prefix: string, fallback: ProviderConfig): ProviderConfig {
  const provider = env(`${prefix}_PROVIDER`, fallback.provider);
  const base =
    provider.toLowerCase() === fallback.provider.toLowerCase() ? fallback : vendorDefaults(provider);

  return {
    provider,
    apiKey: env(`${prefix}_API_KEY`, base.apiKey),
    model: env(`${prefix}_MODEL`, base.model),
    baseUrl: env(`${prefix}_BASE_URL`, base.baseUrl),
  };
}

/** Read a string env var with a fallback default. */
function env(key: string, fallback: string): string {
  return process.env[key]?.trim() || fallback;
}

/** Read a positive integer env var with a fallback default. */
function envInt(key: string, fallback: number): number {
  const raw = process.env[key]?.trim();
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) || parsed < 1 ? fallback : parsed;
}
