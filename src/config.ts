/**
 * Configuration file loading and validation.
 *
 * The config file is a flat JSON object:
 *
 *   { "domain": "example.com", "apikey": "pk1_...", "secretapikey": "sk1_..." }
 */
import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { CONFIG_FILE_NAME } from './constants.js';
import { cleanDomain } from './domain.js';
import { ConfigError, errorMessage, formatZodError } from './errors.js';
import type { ClientConfig } from './types.js';

export const configFileSchema = z.object({
  domain: z.string().trim().min(1),
  apikey: z.string().min(1),
  secretapikey: z.string().min(1),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Config file location: `$PORKBUN_CONFIG`, or `.porkbungo` in the home directory.
 */
export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env['PORKBUN_CONFIG'];
  if (explicit) {
    return explicit;
  }
  return join(env['HOME'] ?? homedir(), CONFIG_FILE_NAME);
}

/**
 * Validate the parsed contents of a config file.
 */
export function parseClientConfig(data: unknown, source = 'config'): ClientConfig {
  const parsed = configFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(
      `invalid config in ${source}: ${formatZodError(parsed.error)}`,
      { cause: parsed.error }
    );
  }

  const domain = cleanDomain(parsed.data.domain);
  if (!domain) {
    throw new ConfigError(`invalid config in ${source}: domain: not a domain name`);
  }

  return {
    domain,
    credentials: {
      apiKey: parsed.data.apikey,
      secretApiKey: parsed.data.secretapikey,
    },
  };
}

/**
 * Read and validate the config file at `path`.
 */
export async function readClientConfig(path: string): Promise<ClientConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigError(
      `failed to open config file ${path}: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`invalid JSON in ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  return parseClientConfig(data, path);
}

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Parse a duration such as `60s`, `1m30s`, `500ms` or `1.5h` into
 * milliseconds. A bare `0` is accepted.
 */
export function parseDuration(text: string): number {
  const input = text.trim();
  if (input === '0') {
    return 0;
  }
  if (!/^(\d+(\.\d+)?(ms|h|m|s))+$/.test(input)) {
    throw new ConfigError(`invalid duration "${text}"`);
  }

  let total = 0;
  for (const match of input.matchAll(/(\d+(?:\.\d+)?)(ms|h|m|s)/g)) {
    const [, amount = '0', unit = 'ms'] = match;
    total += Number(amount) * (DURATION_UNITS[unit] ?? 0);
  }
  return Math.round(total);
}
