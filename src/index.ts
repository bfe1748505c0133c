import type { Server } from 'node:http';
import { API_CONFIG, type ApiConfig } from './config';
import { TtlCache } from './cache/ttlCache';
import { HostThrottle } from './client/throttle';
import { NaverSearchClient } from './client/searchClient';
import { NaverTrendClient } from './client/trendClient';
import { CredentialProvider } from './credentials/credentialProvider';
import { ExactMatchAggregator } from './search/exactMatchAggregator';
import { createApp, type AppDependencies } from './api/server';

/** Search and trend clients share one response cache and one per-host limiter. */
function buildDependencies(config: ApiConfig = API_CONFIG): AppDependencies {
  const credentials = new CredentialProvider({ secretsFile: config.secretsFile });
  const cache = new TtlCache<unknown>();
  const throttle = new HostThrottle(config.requestsPerSecond);

  const searchClient = new NaverSearchClient({ credentials, cache, throttle, config });
  const trendClient = new NaverTrendClient({ credentials, cache, throttle, config });
  const aggregator = new ExactMatchAggregator(searchClient, config);

  return { credentials, searchClient, aggregator, trendClient, config };
}

async function main() {
  const deps = buildDependencies();
  const app = createApp(deps);

  const server = await new Promise<Server>(resolve => {
    const listening = app.listen(API_CONFIG.port, () => resolve(listening));
  });

  console.log(
    { port: API_CONFIG.port, credentialsConfigured: deps.credentials.isConfigured() },
    `Search API listening on http://localhost:${API_CONFIG.port}`
  );
  if (!deps.credentials.isConfigured()) {
    console.warn({ secretsFile: API_CONFIG.secretsFile }, 'API credentials are not configured yet');
  }

  const handleSignal = (signal: NodeJS.Signals) => {
    console.log({ signal }, 'Signal received, closing server...');
    server.close(err => {
      if (err) console.error({ err }, 'Server did not close cleanly');
      process.exit(err ? 1 : 0);
    });
  };

  process.once('SIGINT', handleSignal);
  process.once('SIGTERM', handleSignal);
}

main().catch(err => {
  console.error({ err }, 'Fatal error');
  process.exit(1);
});
