export const DEFAULT_CHECKER_COMMAND = 'cargo check --message-format=json';
export const DEFAULT_BASELINE_PATH = '.cargo_check_progress.json';
export const DEFAULT_CONTEXT_RADIUS = 6;
export const MAX_NEW_ERROR_EXAMPLES = 5;

/** Prefix of the environment variables that can stand in for any CLI option. */
export const ENV_PREFIX = 'ANCHOR_PATCH';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
/** The iteration cap was hit; patches were applied and need review. */
export const EXIT_PARTIAL = 2;
