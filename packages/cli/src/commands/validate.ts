import { validateGraph } from '@trellis/core';
import {
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  VALIDATE_USAGE,
} from '../constants.js';
import { loadGraphDocument } from '../execution.js';
import { getRequiredOption, validateCommandOptions } from '../parsing.js';
import type { CliIo, ExitCode } from '../types.js';

export async function handleValidateCommand(rawArgs: readonly string[], io: CliIo): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'validate',
      usage: VALIDATE_USAGE,
      allowedOptions: ['graph'],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  const graphPath = getRequiredOption(parsedOptions.options, 'graph', 'path', VALIDATE_USAGE, io);
  if (!graphPath) {
    return EXIT_USAGE_ERROR;
  }

  const document = await loadGraphDocument(graphPath, io);
  if (!document.ok) {
    return document.exitCode;
  }

  const { goal, graph } = document.value;
  const result = validateGraph(graph);
  const errors = [...result.errors];
  if (graph.goalId !== goal.id) {
    errors.push(`Graph "${graph.id}" targets goal "${graph.goalId}" but the document defines goal "${goal.id}".`);
  }

  if (errors.length === 0) {
    io.stdout(`Graph "${graph.id}" is valid.`);
  } else {
    io.stderr(`Graph "${graph.id}" is invalid:`);
    for (const error of errors) {
      io.stderr(`  error: ${error}`);
    }
  }

  for (const warning of result.warnings) {
    io.stdout(`  warning: ${warning}`);
  }

  return errors.length === 0 ? EXIT_SUCCESS : EXIT_USAGE_ERROR;
}
