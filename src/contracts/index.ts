/**
 * Core contracts and Zod schemas for condaci
 *
 * CI state values are opaque strings: they are checked for presence,
 * never parsed or normalised.
 */

import { z } from 'zod';

// ============================================================================
// Commands
// ============================================================================

/** Program name followed by its arguments. */
export const CommandSchema = z.array(z.string()).nonempty().readonly();

export type Command = readonly [string, ...string[]];

// ============================================================================
// CI state
// ============================================================================

export const CiStateSchema = z.object({
  pullRequest: z.string(),
  branch: z.string(),
  tag: z.string(),
});

export type CiState = z.infer<typeof CiStateSchema>;

/** Environment variables the CI state is read from, as Travis CI names them. */
export const CiEnvSchema = z.object({
  TRAVIS_PULL_REQUEST: z.string({ required_error: 'TRAVIS_PULL_REQUEST is not set' }),
  TRAVIS_BRANCH: z.string({ required_error: 'TRAVIS_BRANCH is not set' }),
  TRAVIS_TAG: z.string({ required_error: 'TRAVIS_TAG is not set' }),
});

// ============================================================================
// Upload target
// ============================================================================

/** The channel may be empty: an empty branch name is passed through. */
export const UploadTargetSchema = z.object({
  key: z.string().min(1, 'binstar key is empty'),
  user: z.string().min(1, 'binstar user is empty'),
  channel: z.string(),
  artifactPath: z.string().min(1, 'artifact path is empty'),
});

export type UploadTarget = z.infer<typeof UploadTargetSchema>;

// ============================================================================
// Tool configuration
// ============================================================================

export const ToolConfigSchema = z.object({
  minicondaDir: z.string().min(1),
  installerFile: z.string().min(1),
  python: z.string().min(1),
  plugins: z.array(z.string().min(1)).nonempty(),
});

export type ToolConfig = z.infer<typeof ToolConfigSchema>;
