import { EXIT_USAGE_ERROR, RUN_USAGE } from '../constants.js';
import {
  executeWithSessionStore,
  loadCliConfig,
  loadGraphDocument,
  loadMockResponses,
  parseInputOption,
} from '../execution.js';
import { getRequiredOption, validateCommandOptions } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

export async function handleRunCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'run',
      usage: RUN_USAGE,
      allowedOptions: ['graph', 'input', 'entry', 'session', 'responses', 'verbose'],
      flagOptions: ['verbose'],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  const { options } = parsedOptions;
  const graphPath = getRequiredOption(options, 'graph', 'path', RUN_USAGE, io);
  if (!graphPath) {
    return EXIT_USAGE_ERROR;
  }

  const input = parseInputOption(options.get('input'), RUN_USAGE, io);
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
        executor.execute({
          graph,
          goal,
          input: input.value,
          entryPoint: options.get('entry'),
          sessionId: options.get('session'),
          signal,
        }),
    },
    dependencies,
    io,
  );
}
