import { promises as fs } from "node:fs";

import type { RagPipeline } from "../../rag/pipeline.js";

export async function runIngestCommand(args: string[], pipeline: RagPipeline): Promise<void> {
  const [first] = args;
  const isDirectory = first !== undefined && args.length === 1 && (await fs.stat(first)).isDirectory();

  // No arguments: the configured documents directory.
  const source = first === undefined ? {} : isDirectory ? { directory: first } : { paths: args };
  const result = await pipeline.runIngestion(source);

  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
}
