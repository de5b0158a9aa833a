#!/usr/bin/env node
/**
 * wirecat CLI Entry Point
 */

import { defaultIO, main } from "./cli.js";

const shutdown = new AbortController();

// Graceful shutdown
process.once("SIGINT", () => shutdown.abort());
process.once("SIGTERM", () => shutdown.abort());

main(process.argv.slice(2), { ...defaultIO(), signal: shutdown.signal })
  .then((code) => {
    process.exit(code);
  })
  .catch((err) => {
    console.error("Unexpected failure:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
