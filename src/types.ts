/** Porkbun API key pair, sent in the body of every request */
export interface Credentials {
  apiKey: string;
  secretApiKey: string;
}

/** Contents of the local configuration file */
export interface ClientConfig {
  /** The registered domain whose records are managed (e.g., example.com) */
  domain: string;
  credentials: Credentials;
}

/** A DNS record as returned by Porkbun */
export interface PorkbunRecord {
  id: string;
  /** Fully qualified name (e.g., www.example.com) */
  name: string;
  type: string;
  content: string;
  ttl: string;
  prio: string;
  notes: string;
}

/** Result of the Porkbun `ping` call */
export interface PingResult {
  status: string;
  /** The caller's public IP as seen by Porkbun */
  yourIp: string;
}

/** Record fields accepted by create and edit calls */
export interface RecordInput {
  /** Subdomain label, without the domain. Empty for the root domain, `*` for a wildcard. */
  name: string;
  type: string;
  content: string;
  /** Seconds. Porkbun's minimum and default is 600. */
  ttl?: number;
  prio?: number;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export type SkipReason = 'check-url-reachable' | 'dns-up-to-date' | 'record-exists';

/** Outcome of a dynamic DNS run */
export type DynDnsResult =
  | { action: 'skipped'; reason: 'check-url-reachable'; hostname: string }
  | {
      action: 'skipped';
      reason: Exclude<SkipReason, 'check-url-reachable'>;
      hostname: string;
      ip: string;
    }
  | { action: 'updated'; hostname: string; ip: string };
