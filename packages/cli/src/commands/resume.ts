import { EXIT_USAGE_ERROR, RESUME_USAGE } from '../constants.js';
import {
  executeWithSessionStore,
  loadCliConfig,
  loadGraphDocument,
  loadMockResponses,
  parseInputOption,
} from '../execution.js';
import { getRequiredOption, validateCommandOptions } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

export async function handleResumeCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'resume',
      usage: RESUME_USAGE,
      allowedOptions: ['session', 'graph', 'input', 'responses', 'verbose'],
      flagOptions: ['verbose'],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  const { options } = parsedOptions;
  const sessionId = getRequiredOption(options, 'session', 'id', RESUME_USAGE, io);
  if (!sessionId) {
    return EXIT_USAGE_ERROR;
  }

  const graphPath = getRequiredOption(options, 'graph', 'path', RESUME_USAGE, io);
  if (!graphPath) {
    return EXIT_USAGE_ERROR;
  }

  const input = parseInputOption(options.get('input'), RESUME_USAGE, io);
  if (!input.ok) {
    return input.exitCode;
  }

  const config = loadCliConfig(io);
  if (!config.ok) {
    return config.exitCode;
  }

  const document = await loadGraphDocument(graphPath, io);
  if (!document.ok) {
    return document.exitCode;
  }

  const responses = await loadMockResponses(options.get('responses'), io);
  if (!responses.ok) {
    return responses.exitCode;
  }

  const { goal, graph } = document.value;
  return executeWithSessionStore(
    {
      config: config.value,
      responses: responses.value,
      verbose: options.has('verbose'),
      graphPath,
      run: (executor, signal) =>
        executor.resume({
          sessionId,
          graph,
          goal,
          input: input.value,
          signal,
        }),
    },
    dependencies,
    io,
  );
}
