#!/usr/bin/env node
import { runCli } from "./build.js";

process.exitCode = await runCli(process.argv.slice(2), process.cwd());
