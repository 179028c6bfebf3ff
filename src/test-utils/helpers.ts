/**
 * Test helper utilities
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import type { Logger } from "../lib/logger";

/**
 * Creates a logger that discards everything
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

/**
 * Wait for async operations
 */
export function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Creates a fresh temporary directory; remove it with removeTempDir
 */
export function createTempDir(prefix = "soc-relay-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(dir: string): Promise<void> {
  return fs.rm(dir, { recursive: true, force: true });
}
