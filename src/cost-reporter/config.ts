import fs from 'fs';
import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { AuthError } from './errors';
import type { CostReporterConfig } from './types';

const API_KEY_VARIABLE = 'ANTHROPIC_ADMIN_KEY';
const BASE_URL_VARIABLE = 'ANTHROPIC_BASE_URL';
export const DEFAULT_BASE_URL = 'https://api.anthropic.com';

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1']);

function isAllowedBaseUrl(value: string): boolean {
  let url: URL;
  try {
    url = new URL(value);
  } catch (e) {
    return false;
  }
  return url.protocol === 'https:' || (url.protocol === 'http:' && LOOPBACK_HOSTS.has(url.hostname));
}

const BaseUrlSchema = z
  .string()
  .refine(
    isAllowedBaseUrl,
    'ANTHROPIC_BASE_URL must be an HTTPS URL (plain HTTP is only allowed on a loopback host)'
  )
  .transform((value) => value.replace(/\/+$/, ''));

function envFilePath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '.env');
}

function readEnvFile(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  // Parsed values stay local; the file is never merged into process.env.
  return dotenv.parse(fs.readFileSync(filePath));
}

/**
 * Resolves the admin API key and endpoint. The process environment wins over `~/.env`.
 * A missing key is an AuthError so that nothing reaches the network without a credential.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir()
): CostReporterConfig {
  const filePath = envFilePath(homeDir);
  const fileValues = readEnvFile(filePath);

  // A blank variable in the environment does not shadow the key in the file.
  const apiKey = env[API_KEY_VARIABLE]?.trim() || fileValues[API_KEY_VARIABLE]?.trim() || '';
  if (!apiKey) {
    throw new AuthError(`${API_KEY_VARIABLE} not found in the environment or in ${filePath}`);
  }

  const baseUrl = BaseUrlSchema.parse(
    env[BASE_URL_VARIABLE] ?? fileValues[BASE_URL_VARIABLE] ?? DEFAULT_BASE_URL
  );

  return { apiKey, baseUrl };
}

export function redactApiKey(apiKey: string): string {
  return apiKey.length > 4 ? `${apiKey.slice(0, 4)}***` : '***';
}
