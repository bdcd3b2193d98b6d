import dotenv from "dotenv";

dotenv.config();

export interface AppConfig {
  port: number;
  domainBase?: string;
  corsOrigins: string[];
  dbConnection?: string;
  supabaseUrl?: string;
  supabaseKey?: string;
  imageBucket: string;
  tokenSecret: string;
  /** Access token lifetime in seconds. */
  tokenExpiration: number;
  /** Refresh token lifetime in seconds. */
  refreshTokenExpiration: number;
  saltRounds: number;
  adminContacts: string[];
  geminiApiKey?: string;
  geminiModel: string;
  wsHeartbeatInterval: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const optional = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const positiveInt = (name: string, value: string | undefined, fallback: number): number => {
  const raw = optional(value);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return Number(raw);
};

export const normalizeContact = (contact: string): string => {
  const trimmed = contact.trim();
  return trimmed.includes("@") ? trimmed.toLowerCase() : trimmed;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const tokenSecret = optional(env.TOKEN_SECRET);
  if (!tokenSecret) {
    throw new ConfigError("TOKEN_SECRET is not set");
  }

  const domainBase = optional(env.DOMAIN_BASE);
  return {
    port: positiveInt("PORT", env.PORT, 3000),
    domainBase,
    corsOrigins: ["http://localhost:3000", "http://localhost:5173"].concat(domainBase ? [domainBase] : []),
    dbConnection: optional(env.DB_CONNECTION),
    supabaseUrl: optional(env.SUPABASE_URL),
    supabaseKey: optional(env.SUPABASE_KEY),
    imageBucket: optional(env.SUPABASE_BUCKET) ?? "report_photos",
    tokenSecret,
    tokenExpiration: positiveInt("TOKEN_EXPIRATION", env.TOKEN_EXPIRATION, 3600),
    refreshTokenExpiration: positiveInt("REFRESH_TOKEN_EXPIRATION", env.REFRESH_TOKEN_EXPIRATION, 604800),
    saltRounds: positiveInt("BCRYPT_ROUNDS", env.BCRYPT_ROUNDS, 10),
    adminContacts: (env.ADMIN_CONTACTS ?? "")
      .split(",")
      .map((contact) => contact.trim())
      .filter(Boolean)
      .map(normalizeContact),
    geminiApiKey: optional(env.GEMINI_API_KEY),
    geminiModel: optional(env.GEMINI_MODEL) ?? "gemini-1.5-flash",
    wsHeartbeatInterval: positiveInt("WS_HEARTBEAT_INTERVAL_MS", env.WS_HEARTBEAT_INTERVAL_MS, 30000),
  };
};
