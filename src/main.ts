#!/usr/bin/env node
/**
 * Entry point: narrator <input.json> -m <model.onnx> [options]
 * SIGINT cancels the run; no partial output file is left behind.
 */

import { runCli } from "./cli/run";
import { logger } from "./logging";

async function main(): Promise<void> {
  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn({ event: "SIGINT" }, "Interrupted; cancelling narration");
    controller.abort();
  };
  process.once("SIGINT", onSigint);
  try {
    process.exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
  } finally {
    process.off("SIGINT", onSigint);
  }
}

main().catch((err: unknown) => {
  console.error(`error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
