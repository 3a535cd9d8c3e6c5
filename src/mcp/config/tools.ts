// Default tail length for `get_output`.
export const GET_OUTPUT_DEFAULT_LINES = 50;

// How many stopped servers `check_status` mentions after the running ones.
export const CHECK_STATUS_MAX_STOPPED = 5;
