import dotenv from 'dotenv';
dotenv.config();

export type DefaultConfig = {
  SUPABASE_URL: string;
  SUPABASE_KEY: string;
  LOG_LEVEL: string;
  LOG_DIR: string;
  DASHBOARD_PORT: number;
  POOL_ID: string;
  ENV: 'dev' | 'prod' | 'test';
};

function parseEnv(value: string | undefined): DefaultConfig['ENV'] {
  if (value === 'prod' || value === 'test') return value;
  if (process.env.NODE_ENV === 'test') return 'test';
  return 'dev';
}

export const DEFAULT_CONFIG: DefaultConfig = {
  SUPABASE_URL: process.env.SUPABASE_URL || "",
  SUPABASE_KEY: process.env.SUPABASE_SERVICE_ROLE_KEY || process.env.SUPABASE_KEY || "",
  LOG_LEVEL: process.env.LOG_LEVEL || "",
  LOG_DIR: process.env.LOG_DIR || "",
  DASHBOARD_PORT: parseInt(process.env.DASHBOARD_PORT || '3000', 10),
  POOL_ID: process.env.POOL_ID || "default",
  ENV: parseEnv(process.env.ENV),
};
