// Wait after SIGTERM before probing and escalating to SIGKILL.
export const STOP_GRACE_MS = 1000;

// Wait after a detached launch before reading the PID file.
export const LAUNCH_SETTLE_MS = 500;

// How many stopped servers `status` lists.
export const STATUS_RECENT_STOPPED_LIMIT = 5;

export const STATE_SCHEMA_VERSION = "1.0";
