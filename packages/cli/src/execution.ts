import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  createGraphExecutor,
  parseGraphDocument,
  parseMockResponses,
  type ExecutionResult,
  type GraphExecutor,
  type GraphRunEvent,
  type MockResponses,
} from '@trellis/core';
import { createSqliteSessionStore, type TrellisDatabase } from '@trellis/db';
import { isRecord, type GraphDocument } from '@trellis/shared';
import {
  EXIT_NOT_FOUND,
  EXIT_RUNTIME_ERROR,
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
} from './constants.js';
import { resolveCliConfig } from './config.js';
import { toErrorMessage, usageError } from './io.js';
import type { CliConfig, CliDependencies, CliIo, ExitCode, Resolved } from './types.js';

export function hasErrorCode(error: unknown, expectedCode: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === expectedCode;
}

export function loadCliConfig(io: CliIo): Resolved<CliConfig> {
  const resolved = resolveCliConfig(io);
  if (!resolved.ok) {
    io.stderr(resolved.message);
    return { ok: false, exitCode: EXIT_USAGE_ERROR };
  }

  return { ok: true, value: resolved.config };
}

export function openInitializedDatabase(dependencies: CliDependencies, config: CliConfig): TrellisDatabase {
  const db = dependencies.openDatabase(config.databasePath);
  dependencies.migrateDatabase(db);
  return db;
}

async function loadJsonFile<T>(
  path: string,
  label: string,
  parse: (value: unknown) => T,
  io: CliIo,
): Promise<Resolved<T>> {
  let text: string;
  try {
    text = await readFile(resolve(io.cwd, path), 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      io.stderr(`The ${label} "${path}" was not found.`);
      return { ok: false, exitCode: EXIT_NOT_FOUND };
    }
    io.stderr(`Failed to read the ${label} "${path}": ${toErrorMessage(error)}`);
    return { ok: false, exitCode: EXIT_RUNTIME_ERROR };
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    io.stderr(`The ${label} "${path}" is not valid JSON: ${toErrorMessage(error)}`);
    return { ok: false, exitCode: EXIT_USAGE_ERROR };
  }

  try {
    return { ok: true, value: parse(value) };
  } catch (error) {
    io.stderr(`Invalid ${label} "${path}": ${toErrorMessage(error)}`);
    return { ok: false, exitCode: EXIT_USAGE_ERROR };
  }
}

export function loadGraphDocument(path: string, io: CliIo): Promise<Resolved<GraphDocument>> {
  return loadJsonFile(path, 'graph document', parseGraphDocument, io);
}

export async function loadMockResponses(path: string | undefined, io: CliIo): Promise<Resolved<MockResponses>> {
  if (path === undefined) {
    return { ok: true, value: {} };
  }
  return loadJsonFile(path, 'responses file', parseMockResponses, io);
}

export function parseInputOption(
  raw: string | undefined,
  usage: string,
  io: Pick<CliIo, 'stderr'>,
): Resolved<Record<string, unknown> | undefined> {
  if (raw === undefined) {
    return { ok: true, value: undefined };
  }

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    value = undefined;
  }

  if (!isRecord(value)) {
    return { ok: false, exitCode: usageError(io, 'Option "--input" must be a JSON object.', usage) };
  }
  return { ok: true, value };
}

export function formatRunEvent(event: GraphRunEvent): string {
  switch (event.type) {
    case 'run_started':
      return `[run_started] graph=${event.graphId} entry=${event.entryNodeId} resumed=${event.resumed}`;
    case 'node_started':
      return `[node_started] node=${event.nodeId} step=${event.step}`;
    case 'node_attempt_failed':
      return `[node_attempt_failed] node=${event.nodeId} attempt=${event.attempt} willRetry=${event.willRetry} error=${event.error}`;
    case 'node_completed':
      return `[node_completed] node=${event.nodeId} status=${event.status} attempts=${event.attempts} contextVersion=${event.contextVersion}`;
    case 'edge_taken':
      return `[edge_taken] edge=${event.edgeId} ${event.source} -> ${event.target}`;
    case 'run_paused':
      return `[run_paused] node=${event.nodeId} reason=${event.reason}`;
    case 'run_finished':
      return event.errorCode === null
        ? `[run_finished] status=${event.status}`
        : `[run_finished] status=${event.status} error=${event.errorCode}`;
  }
}

export function formatPath(path: readonly string[]): string {
  return path.length === 0 ? '(none)' : path.join(' -> ');
}

export function toResultExitCode(result: ExecutionResult): ExitCode {
  if (result.status !== 'failed') {
    return EXIT_SUCCESS;
  }

  switch (result.error?.code) {
    case 'SESSION_NOT_FOUND':
      return EXIT_NOT_FOUND;
    case 'GRAPH_INVALID':
      return EXIT_USAGE_ERROR;
    default:
      return EXIT_RUNTIME_ERROR;
  }
}

export function reportExecutionResult(result: ExecutionResult, graphPath: string, io: CliIo): ExitCode {
  const steps = `${result.stepsExecuted} ${result.stepsExecuted === 1 ? 'step' : 'steps'}`;

  if (result.status === 'succeeded') {
    io.stdout(`Run ${result.runId} succeeded after ${steps}.`);
    io.stdout(`Path: ${formatPath(result.path)}`);
    io.stdout(`Output: ${JSON.stringify(result.output)}`);
  } else if (result.status === 'paused') {
    const reason = result.sessionState?.pauseReason ?? 'pause_node';
    io.stdout(`Run ${result.runId} paused at node "${result.pausedAt ?? ''}" (${reason}) after ${steps}.`);
    io.stdout(`Path: ${formatPath(result.path)}`);
    io.stdout(`Resume with: trellis resume --session ${result.runId} --graph ${graphPath}`);
  } else {
    const error = result.error;
    const detail = error ? `[${error.code}] ${error.message}` : 'unknown error';
    io.stderr(`Run ${result.runId} failed after ${steps}: ${detail}`);
    io.stdout(`Path: ${formatPath(result.path)}`);
  }

  return toResultExitCode(result);
}

export type SessionExecutionParams = {
  config: CliConfig;
  responses: MockResponses;
  verbose: boolean;
  graphPath: string;
  run: (executor: GraphExecutor, signal: AbortSignal) => Promise<ExecutionResult>;
};

/**
 * Wires the SQLite session store, the step executor and interrupt handling
 * around one executor call, then prints the result.
 */
export async function executeWithSessionStore(
  params: SessionExecutionParams,
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  let db: TrellisDatabase;
  try {
    db = openInitializedDatabase(dependencies, params.config);
  } catch (error) {
    io.stderr(`Failed to open session database: ${toErrorMessage(error)}`);
    return EXIT_RUNTIME_ERROR;
  }

  const executor = createGraphExecutor({
    stepExecutor: dependencies.createStepExecutor(params.responses),
    sessionStore: createSqliteSessionStore(db),
    config: {
      maxSteps: params.config.maxSteps,
      nodeTimeoutMs: params.config.nodeTimeoutMs,
      model: params.config.model,
    },
    onEvent: params.verbose ? event => io.stderr(formatRunEvent(event)) : undefined,
  });

  const controller = new AbortController();
  const dispose = dependencies.onInterrupt(() => controller.abort());
  try {
    const result = await params.run(executor, controller.signal);
    return reportExecutionResult(result, params.graphPath, io);
  } finally {
    dispose();
  }
}
