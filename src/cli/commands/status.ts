import type { RagPipeline } from "../../rag/pipeline.js";

export async function runStatusCommand(pipeline: RagPipeline): Promise<void> {
  const info = await pipeline.systemInfo();
  process.stdout.write(`${JSON.stringify(info, null, 2)}\n`);
}
