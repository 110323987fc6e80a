/**
 * Live test: print the public IP Porkbun sees and the A records of a domain.
 *
 * Usage:
 *   PORKBUN_API_KEY=xxx PORKBUN_SECRET_KEY=yyy npx tsx examples/records.ts example.com
 */

import { listRecords, porkbun } from '../src/index.js';

const domain = process.argv[2];
const apiKey = process.env.PORKBUN_API_KEY;
const secretApiKey = process.env.PORKBUN_SECRET_KEY;

if (!domain) {
  console.error('Usage: PORKBUN_API_KEY=xxx PORKBUN_SECRET_KEY=yyy npx tsx examples/records.ts <domain>');
  process.exit(1);
}

if (!apiKey || !secretApiKey) {
  console.error('Missing PORKBUN_API_KEY or PORKBUN_SECRET_KEY environment variable.');
  console.error('Create a key pair at: https://porkbun.com/account/api');
  console.error('API access must also be enabled for the domain.');
  process.exit(1);
}

async function main(domainName: string, credentials: { apiKey: string; secretApiKey: string }) {
  const client = porkbun({ credentials });

  const { yourIp } = await client.ping();
  console.log(`\nPorkbun sees you as ${yourIp}`);

  console.log(`\nA records of ${domainName}:`);
  const { lines } = await listRecords(client, domainName, 'A');
  for (const line of lines) {
    console.log(`  ${line}`);
  }
  if (lines.length === 0) {
    console.log('  (none)');
  }
}

main(domain, { apiKey, secretApiKey }).catch((err: unknown) => {
  console.error('\nError:', err instanceof Error ? err.message : err);
  process.exit(1);
});
