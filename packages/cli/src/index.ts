#!/usr/bin/env -S node --import tsx
import { runCli } from "./cli.js";

process.exitCode = await runCli(process.argv);
