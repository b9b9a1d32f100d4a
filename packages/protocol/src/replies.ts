/**
 * Plain-text replies the server sends for non-listing commands
 */
export const Replies = {
  ok: 'OK',
  aboveRoot: 'Cannot go above the root directory',
  invalidDirectory: 'Invalid directory path',
  missingArgument: 'Directory argument is required',
  unknownCommand: 'Unknown command',
  requestFailed: 'Error processing request',
} as const;
