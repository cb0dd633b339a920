#!/usr/bin/env node
import "dotenv/config";
import { createProgram } from "./program.js";

process.on("unhandledRejection", (reason) => {
  console.error("[teamwire] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[teamwire] Uncaught exception:", err);
  process.exit(1);
});

createProgram().parseAsync(process.argv).catch((err: unknown) => {
  console.error(`[teamwire] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
