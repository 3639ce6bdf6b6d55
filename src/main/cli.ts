#!/usr/bin/env node
// oslq entry point

import { runCli } from './app.js';

process.exitCode = await runCli(process.argv.slice(2), {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
});
