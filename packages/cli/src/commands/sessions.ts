import { deleteGraphSession, listGraphSessions } from '@trellis/db';
import {
  EXIT_NOT_FOUND,
  EXIT_RUNTIME_ERROR,
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  SESSIONS_DELETE_USAGE,
  SESSIONS_USAGE,
} from '../constants.js';
import { loadCliConfig, openInitializedDatabase } from '../execution.js';
import { toErrorMessage, usageError } from '../io.js';
import { getRequiredOption, validateCommandOptions } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

async function handleSessionsListCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'sessions',
      usage: SESSIONS_USAGE,
      allowedOptions: [],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  const config = loadCliConfig(io);
  if (!config.ok) {
    return config.exitCode;
  }

  try {
    const sessions = listGraphSessions(openInitializedDatabase(dependencies, config.value));
    if (sessions.length === 0) {
      io.stdout('No sessions.');
      return EXIT_SUCCESS;
    }

    for (const session of sessions) {
      io.stdout(
        `${session.sessionId} graph=${session.graphId}@${session.graphVersion} pausedAt=${session.pausedAt} reason=${session.pauseReason} steps=${session.stepsExecuted} savedAt=${session.savedAt}`,
      );
    }
    return EXIT_SUCCESS;
  } catch (error) {
    io.stderr(`Failed to list sessions: ${toErrorMessage(error)}`);
    return EXIT_RUNTIME_ERROR;
  }
}

async function handleSessionsDeleteCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'sessions delete',
      usage: SESSIONS_DELETE_USAGE,
      allowedOptions: ['session'],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  const sessionId = getRequiredOption(parsedOptions.options, 'session', 'id', SESSIONS_DELETE_USAGE, io);
  if (!sessionId) {
    return EXIT_USAGE_ERROR;
  }

  const config = loadCliConfig(io);
  if (!config.ok) {
    return config.exitCode;
  }

  try {
    const deleted = deleteGraphSession(openInitializedDatabase(dependencies, config.value), sessionId);
    if (!deleted) {
      io.stderr(`Session "${sessionId}" was not found.`);
      return EXIT_NOT_FOUND;
    }

    io.stdout(`Deleted session "${sessionId}".`);
    return EXIT_SUCCESS;
  } catch (error) {
    io.stderr(`Failed to delete session "${sessionId}": ${toErrorMessage(error)}`);
    return EXIT_RUNTIME_ERROR;
  }
}

export async function handleSessionsCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const [subcommand, ...rest] = rawArgs;
  if (subcommand === undefined || subcommand.startsWith('--')) {
    return handleSessionsListCommand(rawArgs, dependencies, io);
  }

  if (subcommand === 'delete') {
    return handleSessionsDeleteCommand(rest, dependencies, io);
  }

  return usageError(io, `Unknown sessions subcommand "${subcommand}".`, SESSIONS_USAGE);
}
