import { parseArgs } from 'node:util';
import { z } from 'zod';
import { defaultConfigPath, parseDuration, readClientConfig } from './config.js';
import { DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS } from './constants.js';
import { runDynDns } from './dyndns.js';
import { ConfigError, errorMessage, formatZodError } from './errors.js';
import { createChildLogger, logLevelSchema, setLogLevel } from './logger.js';
import { listRecords } from './print-records.js';
import { porkbun } from './providers/porkbun.js';
import type { PorkbunRecord } from './types.js';

const log = createChildLogger({ service: 'cli' });

export const USAGE = `Usage: porkbun-ddns [flags]

  -print <types>       Comma-separated list of record types (A, AAAA, CNAME, TXT, ...)
                       to print. Use "all" to print every record.
  -dyndns              Look up the current public IP and make it the A record
                       of the configured domain (or -subdomain).
  -subdomain <name>    Subdomain to update in -dyndns mode. Empty updates the root domain.
  -check-url <url>     If a GET of this URL gets any HTTP response, -dyndns assumes
                       the record is correct and updates nothing.
  -timeout <duration>  Deadline for all Porkbun requests combined (default 60s).
  -config <path>       Config file (default $PORKBUN_CONFIG or ~/.porkbungo).
  -dual-stack          Use the dual-stack API host instead of the IPv4-only one.
  -log-level <level>   fatal, error, warn, info, debug, trace or silent.
  -help                Show this help.
`;

const cliOptionsSchema = z.object({
  print: z.string().optional(),
  dyndns: z.boolean(),
  subdomain: z.string().trim(),
  checkUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS, 'timeout too long'),
  configPath: z.string().min(1),
  dualStack: z.boolean(),
  logLevel: logLevelSchema.optional(),
  help: z.boolean(),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

/**
 * Accept single-dash long flags (`-dyndns`, `-timeout=30s`).
 */
export function normalizeArgs(argv: readonly string[]): string[] {
  return argv.map((arg) => (/^-[^-]{2,}/.test(arg) ? `-${arg}` : arg));
}

function readArgs(argv: readonly string[]) {
  return parseArgs({
    args: normalizeArgs(argv),
    options: {
      print: { type: 'string' },
      dyndns: { type: 'boolean', default: false },
      subdomain: { type: 'string', default: '' },
      'check-url': { type: 'string' },
      timeout: { type: 'string' },
      config: { type: 'string' },
      'dual-stack': { type: 'boolean', default: false },
      'log-level': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  }).values;
}

/**
 * Parse command-line arguments (without the node and script entries).
 */
export function parseCliArgs(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): CliOptions {
  let values: ReturnType<typeof readArgs>;
  try {
    values = readArgs(argv);
  } catch (err) {
    throw new ConfigError(errorMessage(err), { cause: err });
  }

  const parsed = cliOptionsSchema.safeParse({
    // An empty -print means no listing
    print: values.print || undefined,
    dyndns: values.dyndns,
    subdomain: values.subdomain,
    checkUrl: values['check-url'] || undefined,
    timeoutMs:
      values.timeout === undefined ? DEFAULT_TIMEOUT_MS : parseDuration(values.timeout),
    configPath: values.config ?? defaultConfigPath(env),
    dualStack: values['dual-stack'],
    logLevel: values['log-level'],
    help: values.help,
  });
  if (!parsed.success) {
    throw new ConfigError(formatZodError(parsed.error), { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Run the CLI and return the process exit code.
 *
 * 0: success, 1: runtime failure, 2: usage error.
 */
export async function main(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv, env);
  } catch (err) {
    log.error(errorMessage(err));
    process.stderr.write(USAGE);
    return 2;
  }

  if (options.help) {
    process.stdout.write(USAGE);
    return 0;
  }
  if (options.logLevel) {
    setLogLevel(options.logLevel);
  }
  if (options.print === undefined && !options.dyndns) {
    log.error('Nothing to do: pass -print and/or -dyndns');
    process.stderr.write(USAGE);
    return 2;
  }

  try {
    const config = await readClientConfig(options.configPath);
    log.info(
      { path: options.configPath, domain: config.domain },
      'Read config'
    );

    const client = porkbun({
      credentials: config.credentials,
      ipv4Only: !options.dualStack,
    });

    let records: PorkbunRecord[] | undefined;
    if (options.print !== undefined) {
      const listing = await listRecords(client, config.domain, options.print, {
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      log.info({ count: listing.lines.length }, 'Your records');
      for (const line of listing.lines) {
        console.log(line);
      }
      records = listing.records;
    }

    if (options.dyndns) {
      await runDynDns(client, {
        domain: config.domain,
        subdomain: options.subdomain,
        checkUrl: options.checkUrl,
        timeoutMs: options.timeoutMs,
        knownRecords: records,
      });
    }

    return 0;
  } catch (err) {
    log.fatal({ err }, errorMessage(err));
    return 1;
  }
}
