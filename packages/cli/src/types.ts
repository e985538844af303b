import {
  createMockStepExecutor,
  type MockResponses,
} from '@trellis/core';
import { createDatabase, migrateDatabase, type TrellisDatabase } from '@trellis/db';
import type { StepExecutor } from '@trellis/shared';
import {
  EXIT_NOT_FOUND,
  EXIT_RUNTIME_ERROR,
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
} from './constants.js';

export type ExitCode =
  | typeof EXIT_SUCCESS
  | typeof EXIT_USAGE_ERROR
  | typeof EXIT_NOT_FOUND
  | typeof EXIT_RUNTIME_ERROR;

export type CliIo = {
  stdout: (message: string) => void;
  stderr: (message: string) => void;
  cwd: string;
  env: NodeJS.ProcessEnv;
};

export type CliDependencies = {
  openDatabase: (path: string) => TrellisDatabase;
  migrateDatabase: (db: TrellisDatabase) => void;
  createStepExecutor: (responses: MockResponses) => StepExecutor;
  // Registers an interrupt handler and returns its disposer.
  onInterrupt: (handler: () => void) => () => void;
};

export type MainOptions = {
  dependencies?: CliDependencies;
  io?: CliIo;
};

export type CliEntrypointRuntime = {
  argv: string[];
  exit: (code: number) => void;
};

export type ParsedOptions =
  | {
      ok: true;
      options: Map<string, string>;
      positionals: string[];
    }
  | {
      ok: false;
      message: string;
    };

export type ParsedLongOptionToken =
  | {
      kind: 'positional';
      value: string;
    }
  | {
      kind: 'separator';
    }
  | {
      kind: 'option-inline';
      optionName: string;
      optionValue: string;
    }
  | {
      kind: 'option-next';
      optionName: string;
    }
  | {
      kind: 'flag';
      optionName: string;
    }
  | {
      kind: 'error';
      message: string;
    };

export type ValidatedCommandOptions =
  | {
      ok: true;
      options: Map<string, string>;
      positionals: string[];
    }
  | {
      ok: false;
      exitCode: ExitCode;
    };

export type CommandValidationConfig = {
  commandName: string;
  usage: string;
  allowedOptions: readonly string[];
  flagOptions?: readonly string[];
  positionalCount?: number;
};

export type CliConfig = {
  databasePath: string;
  maxSteps?: number;
  nodeTimeoutMs?: number;
  model?: string;
};

export type Resolved<T> =
  | {
      ok: true;
      value: T;
    }
  | {
      ok: false;
      exitCode: ExitCode;
    };

export const defaultDependencies: CliDependencies = {
  openDatabase: path => createDatabase(path),
  migrateDatabase: db => migrateDatabase(db),
  createStepExecutor: responses => createMockStepExecutor({ responses }),
  onInterrupt: handler => {
    process.once('SIGINT', handler);
    return () => {
      process.off('SIGINT', handler);
    };
  },
};
