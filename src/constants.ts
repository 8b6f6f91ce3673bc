// Classifier timing (seconds)
export const STOP_DEBOUNCE_SECONDS = 5;
export const REPLAY_SUPPRESSION_SECONDS = 3;
export const SECONDS_PER_DAY = 86_400;

// Pack inheritance windows (seconds)
export const PENDING_SUBAGENT_MAX_AGE_SECONDS = 30;
export const SUBAGENT_RETENTION_SECONDS = 300;
export const SIBLING_SESSION_WINDOW_SECONDS = 15;

// Socket
export const SOCKET_READ_TIMEOUT_MS = 2_000;
export const SOCKET_MAX_REQUEST_BYTES = 1024 * 1024; // 1MB
export const CLIENT_TIMEOUT_MS = 2_000;

// Persistence
export const DEFAULT_FLUSH_INTERVAL_SECONDS = 30;

// Desktop popups
export const POPUP_SLOT_COUNT = 5;
export const POPUP_STALE_SLOT_MS = 60 * 1000;
export const POPUP_DISMISS_SECONDS = 4;

// History
export const HISTORY_DEFAULT_LIMIT = 10;
export const HISTORY_MAX_LIMIT = 100;

// Naming
export const PRODUCT_NAME = 'hookchime';
export const DEFAULT_PROJECT_LABEL = 'claude';
export const DEFAULT_SESSION_KEY = 'default';
export const PAUSE_MARKER_FILE = '.paused';
export const SOCKET_FILE = '.hookchimed.sock';
export const CONFIG_FILE = 'config.json';
export const STATE_FILE = '.state.json';
export const HISTORY_DB_FILE = '.history.db';
export const PACKS_DIR = 'packs';
export const MANIFEST_FILES = ['openpeon.json', 'manifest.json'] as const;
export const OVERLAY_SCRIPT = 'scripts/mac-overlay.js';
export const DEFAULT_ICON_FILE = 'icon.png';

// Hook routing
export const AGENT_PERMISSION_MODE = 'delegate';
export const SHELL_TOOL_NAME = 'Bash';
export const TAB_MARKER = '● ';
