/**
 * Fixture HTTP server entry point.
 * Serves the document root until SIGINT/SIGTERM.
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import { loadConfig } from "./config.js";
import { FsFileSource } from "./fsFileSource.js";
import { startWebServer } from "./webServer.js";

const config = loadConfig();

// "relative/../test_file" must resolve for the relative redirect fixture
await fs.mkdir(path.join(config.rootDir, "relative"), { recursive: true });

const server = await startWebServer({
  host: config.host,
  port: config.port,
  secure: config.secure,
  files: new FsFileSource(config.rootDir, config.maxFileSize),
});

const shutdown = (): void => {
  server.stop().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error(err);
      process.exit(1);
    }
  );
};

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
