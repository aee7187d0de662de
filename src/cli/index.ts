#!/usr/bin/env node
import { runCli } from "./runCli";

process.exitCode = runCli(process.argv.slice(2));
