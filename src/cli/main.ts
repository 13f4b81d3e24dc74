#!/usr/bin/env node
import { NodeFileSystem } from '../project/filesystem.js';
import { runCli } from './index.js';

runCli(process.argv.slice(2), {
  fs: new NodeFileSystem(process.cwd()),
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);
