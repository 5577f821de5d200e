/**
 * Reads the branch/tag/pull-request state a Travis CI build runs under.
 */

import { CiEnvSchema, CiStateSchema, type CiState } from '../contracts/index.js';
import { ConfigError } from '../runner/index.js';

/**
 * Snapshot the CI state from `env`. Every variable must be present;
 * an empty string is a valid value.
 */
export function readCiState(env: NodeJS.ProcessEnv = process.env): CiState {
  const parsed = CiEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.errors.map((e) => e.message).join('; '));
  }
  return CiStateSchema.parse({
    pullRequest: parsed.data.TRAVIS_PULL_REQUEST,
    branch: parsed.data.TRAVIS_BRANCH,
    tag: parsed.data.TRAVIS_TAG,
  });
}
