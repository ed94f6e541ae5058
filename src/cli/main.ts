#!/usr/bin/env node
import { formatErrorMessage } from "../errors.js";
import { runCli } from "./program.js";

runCli().catch((err: unknown) => {
  console.error(formatErrorMessage(err));
  process.exitCode = 1;
});
