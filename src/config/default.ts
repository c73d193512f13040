import dotenv from 'dotenv';
import { Identity } from '../types';
import { HOOK_CONSTANTS } from './constants';
import { InvalidArgument } from '../errors';
import { requireNonZeroIdentity } from '../core/identity';

dotenv.config();

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type DefaultConfig = {
  LOG_LEVEL: LogLevel;
  LOG_FILE: string;
  HOOK_ADMIN: string;
  BASE_FEE: string;
  FEE_SENSITIVITY_MULTIPLIER: string;
};

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function parseLogLevel(value: string | undefined): LogLevel {
  const match = LOG_LEVELS.find(level => level === value);
  return match ?? 'info';
}

export const DEFAULT_CONFIG: DefaultConfig = {
  LOG_LEVEL: parseLogLevel(process.env.LOG_LEVEL),
  LOG_FILE: process.env.LOG_FILE || "",
  HOOK_ADMIN: process.env.HOOK_ADMIN || "",
  BASE_FEE: process.env.BASE_FEE || String(HOOK_CONSTANTS.DEFAULT_BASE_FEE),
  FEE_SENSITIVITY_MULTIPLIER: process.env.FEE_SENSITIVITY_MULTIPLIER || "0",
};

/**
 * Validated hook settings derived from the environment.
 */
export interface HookConfig {
  admin: Identity | null;
  baseFee: number;
  feeSensitivityMultiplier: number;
}

function parseBoundedInt(field: string, raw: string, max: number): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new InvalidArgument(`${field} must be a non-negative integer`, { field, value: raw });
  }
  const value = Number(raw.trim());
  if (value > max) {
    throw new InvalidArgument(`${field} exceeds ${max}`, { field, value });
  }
  return value;
}

/**
 * Parse the hook's startup settings. An empty HOOK_ADMIN leaves the admin unset.
 */
export function loadHookConfig(config: DefaultConfig = DEFAULT_CONFIG): HookConfig {
  return {
    admin: config.HOOK_ADMIN ? requireNonZeroIdentity(config.HOOK_ADMIN, 'HOOK_ADMIN') : null,
    baseFee: parseBoundedInt('BASE_FEE', config.BASE_FEE, HOOK_CONSTANTS.MAX_LP_FEE),
    feeSensitivityMultiplier: parseBoundedInt(
      'FEE_SENSITIVITY_MULTIPLIER',
      config.FEE_SENSITIVITY_MULTIPLIER,
      HOOK_CONSTANTS.MAX_SENSITIVITY_MULTIPLIER
    ),
  };
}
