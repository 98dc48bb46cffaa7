#!/usr/bin/env node
import { runDiff } from '../cli.js';

process.exitCode = await runDiff(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text)
});
