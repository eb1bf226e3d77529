#!/usr/bin/env node
import fs from "fs";
import path from "path";
import dotenv from "dotenv";

function loadEnv(): void {
  const explicitPath = process.env.DOTENV_CONFIG_PATH;
  if (explicitPath) {
    dotenv.config({ path: explicitPath });
    return;
  }

  const cwd = process.cwd();
  const candidates = [path.join(cwd, ".env"), path.join(cwd, "..", ".env")];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      dotenv.config({ path: candidate });
      return;
    }
  }

  dotenv.config();
}

loadEnv();

import { loadSettings } from "../config/settings.js";
import { describeError } from "../errors.js";
import { createRagDeps } from "../rag/deps.js";
import { runAskCommand } from "./commands/ask.js";
import { runDeleteCommand, runIngestCommand } from "./commands/ingest.js";
import { runFormatsCommand, runListCommand } from "./commands/list.js";
import { parseCli } from "./parse.js";

export async function main(argv: string[]): Promise<void> {
  const parsed = parseCli(argv);
  if (parsed.command === "formats") {
    runFormatsCommand();
    return;
  }

  const settings = loadSettings();
  const { deps, close } = await createRagDeps(settings);
  try {
    switch (parsed.command) {
      case "ingest":
        await runIngestCommand(parsed.args, deps, parsed.options);
        break;
      case "ask":
        await runAskCommand(parsed.args, deps, parsed.options);
        break;
      case "delete":
        await runDeleteCommand(parsed.args, deps);
        break;
      case "list":
        await runListCommand(deps);
        break;
    }
  } finally {
    await close();
  }
}

try {
  await main(process.argv);
} catch (err: unknown) {
  process.stderr.write(`${describeError(err)}\n`);
  process.exitCode = 1;
}
