#!/usr/bin/env node
import { reportMissingDependencies } from "./dependencies.js";

// Checked before anything that imports them is loaded, and before any network activity.
const exitCode = await reportMissingDependencies();
if (exitCode !== 0) {
  process.exit(exitCode);
}

const { main } = await import("./cli.js");
await main();
