#!/usr/bin/env node
import { closeDb } from "@reelpost/db";
import { DEFAULT_JOB_FILE, USAGE, runRefresh, runUpload } from "./commands.js";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";

async function main(argv: string[]): Promise<number> {
  const [command, ...args] = argv;
  const config = loadConfig();

  try {
    switch (command) {
      case "upload":
        return await runUpload(config, args[0] ?? DEFAULT_JOB_FILE);
      case "refresh":
        return await runRefresh(config);
      default:
        console.error(USAGE);
        return 1;
    }
  } finally {
    if (config.tokenStore === "db") {
      await closeDb();
    }
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", errorMessage(error));
    process.exit(1);
  });
