/**
 * Normalise a configured domain. Accepts URLs or bare domains.
 *
 * Examples:
 * - `https://example.com/path` → `example.com`
 * - `EXAMPLE.COM.` → `example.com`
 * - ` example.com ` → `example.com`
 */
export function cleanDomain(input: string): string {
  let domain = input.trim().toLowerCase();

  if (domain.includes('://')) {
    try {
      domain = new URL(domain).hostname;
    } catch {
      domain = domain.split('://')[1] ?? domain;
    }
  }

  domain = domain.split('/')[0] ?? domain;

  // FQDN notation
  if (domain.endsWith('.')) {
    domain = domain.slice(0, -1);
  }

  return domain;
}

/**
 * Build the fully qualified name of a subdomain.
 *
 * `joinDomain('', 'example.com')` → `example.com`
 * `joinDomain('www', 'example.com')` → `www.example.com`
 */
export function joinDomain(subdomain: string, domain: string): string {
  if (subdomain === '') {
    return domain;
  }
  return `${subdomain}.${domain}`;
}
