#!/usr/bin/env tsx
import { runCli } from "./cli";
import { errorMessage } from "./core/errors";
import { Logger } from "./observability";

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    new Logger({ component: "main", runId: "bootstrap" }).error("fatal", { error: errorMessage(error) });
    process.exitCode = 1;
  });
