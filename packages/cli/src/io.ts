import { EXIT_USAGE_ERROR } from './constants.js';
import type { CliIo, ExitCode } from './types.js';

export function createDefaultIo(): CliIo {
  return {
    stdout: message => console.log(message),
    stderr: message => console.error(message),
    cwd: process.cwd(),
    env: process.env,
  };
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

export function printGeneralUsage(io: Pick<CliIo, 'stdout'>): void {
  io.stdout('Trellis - goal-driven graph executor');
  io.stdout('');
  io.stdout('Usage: trellis <command> [options]');
  io.stdout('');
  io.stdout('Commands:');
  io.stdout('  validate --graph <path>    Check a graph document');
  io.stdout('  run --graph <path> [--input <json>] [--entry <name>] [--session <id>] [--responses <path>] [--verbose]');
  io.stdout('                             Execute a graph with scripted step responses');
  io.stdout('  resume --session <id> --graph <path> [--input <json>] [--responses <path>] [--verbose]');
  io.stdout('                             Continue a paused session');
  io.stdout('  status --session <id>      Show a persisted session');
  io.stdout('  sessions                   List persisted sessions');
  io.stdout('  sessions delete --session <id>');
  io.stdout('                             Remove a persisted session');
  io.stdout('');
  io.stdout('Environment:');
  io.stdout('  TRELLIS_DB_PATH            Session database (default ./trellis.db)');
  io.stdout('  TRELLIS_MAX_STEPS          Step budget per run');
  io.stdout('  TRELLIS_NODE_TIMEOUT_MS    Per-invocation timeout');
  io.stdout('  TRELLIS_MODEL              Model forwarded to the step executor');
}

export function usageError(io: Pick<CliIo, 'stderr'>, message: string, usage: string): ExitCode {
  io.stderr(message);
  io.stderr(usage);
  return EXIT_USAGE_ERROR;
}
