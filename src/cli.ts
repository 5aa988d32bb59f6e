#!/usr/bin/env node
/**
 * nb-post CLI
 * Notebook → Markdown post conversion and embedded image checks
 */

import { createProgram } from "./program.js";
import { handleCliError } from "./utils/error-handler.js";

createProgram()
  .parseAsync()
  .catch((error: unknown) => handleCliError(error, "Unexpected error"));
