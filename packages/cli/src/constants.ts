export const EXIT_SUCCESS = 0;
export const EXIT_USAGE_ERROR = 2;
export const EXIT_NOT_FOUND = 3;
export const EXIT_RUNTIME_ERROR = 4;

export const DEFAULT_DATABASE_FILE = 'trellis.db';

export const VALIDATE_USAGE = 'Usage: trellis validate --graph <path>';
export const RUN_USAGE =
  'Usage: trellis run --graph <path> [--input <json>] [--entry <name>] [--session <id>] [--responses <path>] [--verbose]';
export const RESUME_USAGE =
  'Usage: trellis resume --session <id> --graph <path> [--input <json>] [--responses <path>] [--verbose]';
export const STATUS_USAGE = 'Usage: trellis status --session <id>';
export const SESSIONS_USAGE = 'Usage: trellis sessions [delete --session <id>]';
export const SESSIONS_DELETE_USAGE = 'Usage: trellis sessions delete --session <id>';
