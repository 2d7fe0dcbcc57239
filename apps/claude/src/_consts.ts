export const MILLION = 1_000_000;

export const MS_PER_SECOND = 1_000;
export const MS_PER_HOUR = 3_600_000;

/**
 * Decimal places kept on every per-event and per-window cost.
 */
export const COST_DECIMALS = 6;

/**
 * Blended cost per token used to derive the token ceiling while the window is empty.
 * Matches the default tier with a typical cache-heavy mix.
 */
export const DEFAULT_COST_PER_TOKEN = 9 / MILLION;

/**
 * Events are kept for this many windows before pruning.
 */
export const PRUNE_WINDOW_MULTIPLIER = 2;

export const WARNING_THRESHOLD_PCT = 70;
export const CRITICAL_THRESHOLD_PCT = 90;

export const DEFAULT_PLAN = 'pro';

export const CLAUDE_CONFIG_DIR_ENV = 'CLAUDE_CONFIG_DIR';
export const USAGE_WINDOW_DIR_ENV = 'USAGE_WINDOW_DIR';

export const CLAUDE_PROJECTS_DIR_NAME = 'projects';
export const DASHBOARD_DIR_NAME = 'dashboard';
export const LEDGER_FILE_NAME = 'usage.json';
export const CONFIG_FILE_NAME = 'config.json';
export const SESSION_FILE_EXTENSION = '.jsonl';
