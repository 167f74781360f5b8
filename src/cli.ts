#!/usr/bin/env node
import "dotenv/config";
import { readStream, runCli } from "./cli/run.js";

runCli(process.argv.slice(2), {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  readStdin: () => readStream(process.stdin),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    console.error("[textqueue] fatal:", e);
    process.exit(1);
  });
