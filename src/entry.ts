#!/usr/bin/env node
import { runCli } from "./cli/run-main.js";

await runCli(process.argv.slice(2));
