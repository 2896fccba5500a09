// Shared limits for the command-line front end.

// 10MB default safety ceiling for input payloads.
export const DEFAULT_MAX_INPUT_SIZE = 10_485_760;
