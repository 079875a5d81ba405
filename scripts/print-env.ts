/**
 * Print environment diagnostics without starting the api or worker
 *
 * Usage: npm run print-env
 */

import { initEnv, getEnvDiagnostics, loadSettings } from '@autosel/config';
import { safeErrorMessage } from '@autosel/core';

const KEYS = [
  'REDIS_URL',
  'ADMIN_TOKEN',
  'CORS_ORIGINS',
  'PROPOSER_PROVIDER',
  'PROPOSER_API_KEY',
  'PROPOSER_MODEL',
  'FALLBACK_PROPOSER_PROVIDER',
  'FALLBACK_PROPOSER_API_KEY',
  'FALLBACK_PROPOSER_MODEL',
  'VALIDATOR_PROVIDER',
  'VALIDATOR_API_KEY',
  'VALIDATOR_MODEL',
  'WORKER_CONCURRENCY',
  'FETCH_TIMEOUT_MS',
];

const { repoRoot, envFilePath, envLocalFilePath, loaded, localLoaded, keysLoaded } = initEnv();
const diagnostics = getEnvDiagnostics(KEYS);

console.log('Environment diagnostics');
console.log(`  Repo root: ${repoRoot}`);
console.log(`  .env file: ${envFilePath} (${loaded ? 'loaded' : 'missing'})`);
console.log(`  .env.local file: ${envLocalFilePath} (${localLoaded ? 'loaded' : 'missing'})`);
console.log(`  Keys loaded from files: ${keysLoaded.length}`);

console.log('\nVariables:');
for (const key of diagnostics.keys) {
  const status = key.present ? 'set    ' : 'missing';
  const masked = key.maskedValue ? ` (${key.maskedValue})` : '';
  const source = key.source ? ` [from ${key.source}]` : '';
  console.log(`  ${status} ${key.key}${masked}${source}`);
}

let settingsError: string | null = null;
try {
  const settings = loadSettings();
  console.log('\nOrchestrator settings:');
  console.log(JSON.stringify(settings, null, 2));
} catch (error: unknown) {
  settingsError = safeErrorMessage(error);
  console.log(`\nOrchestrator settings are invalid: ${settingsError}`);
}

if (diagnostics.warnings.length > 0) {
  console.log('\nWarnings:');
  for (const warning of diagnostics.warnings) {
    console.log(`  - ${warning}`);
  }
}

console.log(
  '\n' +
    JSON.stringify({
      event: 'env.diagnostics',
      envFilePath,
      envFileExists: loaded,
      envLocalFileExists: localLoaded,
      variables: diagnostics.keys,
      warnings: diagnostics.warnings,
      settingsError,
    })
);

if (settingsError) {
  process.exitCode = 1;
}
