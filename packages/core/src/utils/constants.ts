// packages/core/src/utils/constants.ts — Shared magic number constants

/** Default per-attempt stage timeout in seconds */
export const DEFAULT_STAGE_TIMEOUT_SEC = 300;

/** Largest stage timeout a Node.js timer can hold (2^31 - 1 ms, in whole seconds) */
export const MAX_STAGE_TIMEOUT_SEC = 2147483;

/** Default workflow definition version */
export const DEFAULT_WORKFLOW_VERSION = '1.0.0';

/** Base delay between stage retry attempts in milliseconds */
export const DEFAULT_RETRY_BACKOFF_MS = 1000;

/** Upper bound for a single retry delay in milliseconds */
export const DEFAULT_MAX_RETRY_BACKOFF_MS = 30000;

/** Debounce window for the workflow watcher in milliseconds */
export const WATCH_DEBOUNCE_MS = 300;

/** Project-relative state directory */
export const STATE_DIR = '.stageflow';
