import "dotenv/config";
import { createProgram } from "./program.js";

process.on("unhandledRejection", (reason) => {
  console.error("[gridswarm] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[gridswarm] Uncaught exception:", err);
  process.exit(1);
});

createProgram().parseAsync().catch((err: unknown) => {
  console.error(`[gridswarm] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
