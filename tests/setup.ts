/**
 * Global test setup for all test suites
 * Keeps the developer's node configuration out of the tests
 */

import process from 'node:process';

import { RPC_ENV_VARS } from '../src/config/env-validator.ts';

for (const name of Object.keys(RPC_ENV_VARS)) {
  delete process.env[name];
}
