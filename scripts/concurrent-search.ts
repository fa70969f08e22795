/**
 * Run several searches concurrently through one scheduler
 *
 * Every task submits its own query; the scheduler spaces them out and
 * hands each result back to the task that asked for it.
 *
 * Usage:
 *   node --env-file=.env --import=tsx scripts/concurrent-search.ts
 *   npm run search:concurrent
 */

import {
  Query,
  SearchApiClient,
  anyOf,
  createScheduledRequest,
  exact,
} from '../src/index.js';

async function main() {
  const scheduler = SearchApiClient.getInstance().startScheduler();

  const tasks = [
    // Plain submission
    scheduler.search(Query.domain(anyOf('example.com', exact('example.org')))),
    scheduler.search(Query.email('test@example.com')),
    // Handle pair built by the caller
    (async () => {
      const { request, reader } = createScheduledRequest(Query.username('jdoe'));
      await scheduler.enqueue(request);
      return reader.result;
    })(),
  ];

  const results = await Promise.allSettled(tasks);
  results.forEach((result, index) => {
    if (result.status === 'fulfilled') {
      console.log(`Task ${index}: ${result.value.total} matches, balance ${result.value.balance}`);
    } else {
      console.log(`Task ${index} failed: ${String(result.reason)}`);
    }
  });

  await scheduler.shutdown();
  console.log('\nScheduler stats:', scheduler.getStats());
}

main().catch((error: unknown) => {
  console.error('Concurrent search failed:', error);
  process.exit(1);
});
