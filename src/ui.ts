/**
 * @fileoverview Intake UI server
 */

import { TriageApiClient, createIntakeApp } from '@triage/intake-ui';
import { loadConfig } from './config';

function main(): void {
  const config = loadConfig();
  const client = new TriageApiClient({ baseUrl: config.apiBase });
  const app = createIntakeApp({ client });

  app.listen(config.uiPort, () => {
    console.log(`[intake-ui] listening on http://localhost:${config.uiPort}, API at ${config.apiBase}`);
  });
}

if (require.main === module) {
  main();
}
