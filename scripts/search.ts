/**
 * Run a single domain search
 *
 * Sends one query straight through the client, without a scheduler.
 *
 * Usage:
 *   # Credentials from .env
 *   node --env-file=.env --import=tsx scripts/search.ts example.com
 *
 *   # Or via npm
 *   npm run search -- example.com example.org
 */

import { Query, SearchApiClient, anyOf, isSearchApiError } from '../src/index.js';

async function main() {
  const domains = process.argv.slice(2);
  if (domains.length === 0) {
    console.error('Usage: npm run search -- <domain> [domain...]');
    process.exit(1);
  }

  const client = SearchApiClient.getInstance();
  const query = domains.length === 1 ? Query.domain(domains[0]) : Query.domain(anyOf(...domains));

  console.log(`Searching ${domains.join(', ')}...\n`);
  const result = await client.execute(query);

  console.log(`Total:   ${result.total}`);
  console.log(`Balance: ${result.balance}`);
  for (const entry of result.entries.slice(0, 20)) {
    console.log(`  #${entry.id} ${entry.email ?? '-'} (${entry.databaseName ?? 'unknown source'})`);
  }
  if (result.entries.length > 20) {
    console.log(`  ... ${result.entries.length - 20} more`);
  }
}

main().catch((error: unknown) => {
  if (isSearchApiError(error)) {
    console.error(`Search failed (${error.kind}): ${error.message}`);
  } else {
    console.error('Search failed:', error);
  }
  process.exit(1);
});
