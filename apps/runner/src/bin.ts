#!/usr/bin/env node

/**
 * Runner entry point.
 */

import { createRunnerApp } from "./app.js";

createRunnerApp()
  .run()
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exitCode = 1;
  });
