/**
 * Upload gate — whether a CI build may upload, and to which channel.
 *
 * Pure functions of an explicit CiState; the optional logger only
 * receives diagnostics.
 */

import type { CiState } from '../contracts/index.js';
import type { StructuredLogger } from '../runner/index.js';

/** Channel that tagged releases are uploaded to. */
export const RELEASE_CHANNEL = 'main';

/**
 * Pull-request builds never upload. Only the exact string `'true'`
 * marks a pull request.
 */
export function canUpload(ci: CiState, log?: StructuredLogger): boolean {
  const isPullRequest = ci.pullRequest === 'true';
  const allowed = !isPullRequest;
  log?.info('gate.can_upload', `Can we upload? : ${allowed}`, { pull_request: ci.pullRequest, allowed });
  return allowed;
}

/**
 * A build whose tag equals its branch is a tagged release and goes to
 * `main`; anything else goes to a channel named after the branch,
 * verbatim (even when the branch is empty).
 */
export function resolveChannel(ci: CiState, log?: StructuredLogger): string {
  const { branch, tag } = ci;
  log?.info('gate.branch', `Travis branch is "${branch}"`, { branch });
  log?.info('gate.tag', `Travis tag found is: "${tag}"`, { tag });

  if (tag !== '' && tag === branch) {
    log?.info('gate.channel', `on a tagged release -> upload to '${RELEASE_CHANNEL}'`, { channel: RELEASE_CHANNEL });
    return RELEASE_CHANNEL;
  }

  log?.info('gate.channel', `not on a tagged release - just upload to the branch name ${branch}`, { channel: branch });
  return branch;
}
