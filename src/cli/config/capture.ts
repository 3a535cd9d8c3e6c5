// Ceilings for diagnostic capture; terminal echo is never limited.
export const MAX_CAPTURE_LINES = 400;
export const MAX_CAPTURE_BYTES = 64 * 1024;

// Captured-line counts that trigger the one-shot PID lookup and interim write.
export const PID_LOOKUP_AFTER_LINES = 3;
export const INTERIM_WRITE_AFTER_LINES = 10;

// Arrays declaring more entries than this are summarized instead of stored.
export const MAX_INLINE_ARRAY_ENTRIES = 2048;

export const MODEL_INFO_SCHEMA_VERSION = 1;
