import path from "node:path";
import os from "node:os";
import fs from "node:fs";

// Per-worker log dir so tests never write into the working tree.
const workerId = process.env.VITEST_POOL_ID ?? process.env.VITEST_WORKER_ID ?? process.pid;
const baseDir = path.join(os.tmpdir(), `tooldeck-test-${workerId}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
fs.mkdirSync(baseDir, { recursive: true });
process.env.TOOLDECK_DATA_DIR = baseDir;
