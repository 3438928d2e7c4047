import type { RagPipeline } from "../../rag/pipeline.js";
import { questionFrom } from "../parse.js";

export async function runAskCommand(args: string[], pipeline: RagPipeline): Promise<void> {
  const question = questionFrom(args, "ask");
  const result = await pipeline.query(question);
  process.stdout.write(`${result.answer}\n`);
}
