import { loadGraphSession } from '@trellis/db';
import {
  EXIT_NOT_FOUND,
  EXIT_RUNTIME_ERROR,
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  STATUS_USAGE,
} from '../constants.js';
import { formatPath, loadCliConfig, openInitializedDatabase } from '../execution.js';
import { toErrorMessage } from '../io.js';
import { getRequiredOption, validateCommandOptions } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

function formatRetryCounts(retryCounts: Readonly<Record<string, number>>): string {
  const entries = Object.entries(retryCounts);
  if (entries.length === 0) {
    return '(none)';
  }
  return entries.map(([nodeId, count]) => `${nodeId}=${count}`).join(' ');
}

export async function handleStatusCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'status',
      usage: STATUS_USAGE,
      allowedOptions: ['session'],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  const sessionId = getRequiredOption(parsedOptions.options, 'session', 'id', STATUS_USAGE, io);
  if (!sessionId) {
    return EXIT_USAGE_ERROR;
  }

  const config = loadCliConfig(io);
  if (!config.ok) {
    return config.exitCode;
  }

  try {
    const db = openInitializedDatabase(dependencies, config.value);
    const session = loadGraphSession(db, sessionId);
    if (!session) {
      io.stderr(`Session "${sessionId}" was not found.`);
      return EXIT_NOT_FOUND;
    }

    io.stdout(`Session ${session.sessionId} graph=${session.graphId}@${session.graphVersion} goal=${session.goalId}`);
    io.stdout(`Paused at: ${session.pausedAt} (${session.pauseReason})`);
    io.stdout(`Steps executed: ${session.stepsExecuted}`);
    io.stdout(`Saved at: ${session.savedAt}`);
    io.stdout(`Path: ${formatPath(session.path)}`);
    io.stdout(`Queued nodes: ${session.queuedNodeIds.length === 0 ? '(none)' : session.queuedNodeIds.join(', ')}`);
    io.stdout(`Retry counts: ${formatRetryCounts(session.retryCounts)}`);
    io.stdout(`Context keys: ${Object.keys(session.context).sort().join(', ') || '(none)'}`);
    return EXIT_SUCCESS;
  } catch (error) {
    io.stderr(`Failed to read session status: ${toErrorMessage(error)}`);
    return EXIT_RUNTIME_ERROR;
  }
}
