#!/usr/bin/env node

import { isExecutedAsScript, runCliEntrypoint } from './entrypoint.js';

export { isExecutedAsScript, main, runCliEntrypoint } from './entrypoint.js';
export type { CliDependencies, CliIo, ExitCode } from './types.js';

if (isExecutedAsScript(process.argv[1], import.meta.url)) {
  await runCliEntrypoint();
}
