import dotenv from 'dotenv';
import { VAULT_CONFIG } from './constants';

dotenv.config();

export type DefaultConfig = {
  SUPABASE_URL: string;
  SUPABASE_KEY: string;
  VAULT_ADMIN: string;
  VAULT_OPERATOR: string;
  VAULT_FEE_RECIPIENT: string;
  VAULT_PERFORMANCE_FEE_BPS: number;
  DASHBOARD_PORT: number;
  LOG_LEVEL: string;
};

function parseIntEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const DEFAULT_CONFIG: DefaultConfig = {
  SUPABASE_URL: process.env.SUPABASE_URL || "",
  SUPABASE_KEY: process.env.SUPABASE_SERVICE_ROLE_KEY || process.env.SUPABASE_KEY || "",
  VAULT_ADMIN: process.env.VAULT_ADMIN || "",
  VAULT_OPERATOR: process.env.VAULT_OPERATOR || "",
  VAULT_FEE_RECIPIENT: process.env.VAULT_FEE_RECIPIENT || "",
  VAULT_PERFORMANCE_FEE_BPS: parseIntEnv(
    process.env.VAULT_PERFORMANCE_FEE_BPS,
    VAULT_CONFIG.DEFAULT_PERFORMANCE_FEE_BPS,
  ),
  DASHBOARD_PORT: parseIntEnv(process.env.DASHBOARD_PORT, 3000),
  LOG_LEVEL: process.env.LOG_LEVEL || "info",
};
