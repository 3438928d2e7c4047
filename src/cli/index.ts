#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
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

const { loadSettings } = await import("../config/settings.js");
const { errorMessage } = await import("../errors.js");
const { createLogger } = await import("../logging/logger.js");
const { createPipeline } = await import("../rag/pipeline.js");
const { runAskCommand } = await import("./commands/ask.js");
const { runIngestCommand } = await import("./commands/ingest.js");
const { runRetrieveCommand } = await import("./commands/retrieve.js");
const { runStatusCommand } = await import("./commands/status.js");
const { parseCli } = await import("./parse.js");

const logger = createLogger("cli");

export async function main(argv: string[]): Promise<void> {
  const parsed = parseCli(argv);
  const settings = loadSettings();
  const pipeline = createPipeline(settings);

  switch (parsed.command) {
    case "ingest":
      await runIngestCommand(parsed.args, pipeline);
      return;
    case "retrieve":
      await runRetrieveCommand(parsed.args, pipeline);
      return;
    case "ask":
      await runAskCommand(parsed.args, pipeline);
      return;
    case "status":
      await runStatusCommand(pipeline);
      return;
  }
}

try {
  await main(process.argv);
} catch (err: unknown) {
  logger.debug({ err }, "command failed");
  process.stderr.write(`${errorMessage(err)}\n`);
  process.exitCode = 1;
}
