import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createMockStepExecutor } from '@trellis/core';
import { createDatabase, migrateDatabase, type TrellisDatabase } from '@trellis/db';
import type { CliDependencies, CliIo } from './types.js';

export type CapturedIo = {
  stdout: string[];
  stderr: string[];
  io: CliIo;
};

export function createCapturedIo(
  options: {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
  } = {},
): CapturedIo {
  const stdout: string[] = [];
  const stderr: string[] = [];

  return {
    stdout,
    stderr,
    io: {
      stdout: message => stdout.push(message),
      stderr: message => stderr.push(message),
      cwd: options.cwd ?? '/work/trellis',
      env: options.env ?? {},
    },
  };
}

export function createDependencies(
  db: TrellisDatabase = createDatabase(),
  overrides: Partial<CliDependencies> = {},
): CliDependencies {
  return {
    openDatabase: () => db,
    migrateDatabase: database => migrateDatabase(database),
    createStepExecutor: responses => createMockStepExecutor({ responses }),
    onInterrupt: () => () => undefined,
    ...overrides,
  };
}

export type TempWorkspace = {
  dir: string;
  writeJson: (name: string, value: unknown) => string;
  cleanup: () => void;
};

export function createTempWorkspace(): TempWorkspace {
  const dir = mkdtempSync(join(tmpdir(), 'trellis-cli-'));
  return {
    dir,
    writeJson: (name, value) => {
      writeFileSync(join(dir, name), JSON.stringify(value, null, 2));
      return name;
    },
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

/** draft -> review (pause) -> publish (terminal, needs `approved`). */
export function createReviewFlowDocument(graphOverrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    goal: {
      id: 'publish-article',
      name: 'Publish article',
      successCriteria: [{ id: 'published', metric: 'published', target: true }],
    },
    graph: {
      id: 'review-flow',
      goalId: 'publish-article',
      version: '1',
      entryNode: 'draft',
      terminalNodes: ['publish'],
      pauseNodes: ['review'],
      outputKeys: ['published'],
      nodes: [
        { id: 'draft', outputKeys: ['draft'] },
        { id: 'review', inputKeys: ['draft'], outputKeys: ['notes'] },
        { id: 'publish', inputKeys: ['draft', 'approved'], outputKeys: ['published'] },
      ],
      edges: [
        { id: 'draft-review', source: 'draft', target: 'review', condition: 'on_success' },
        { id: 'review-publish', source: 'review', target: 'publish', condition: 'on_success' },
      ],
      ...graphOverrides,
    },
  };
}
