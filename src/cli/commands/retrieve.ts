import type { RagPipeline } from "../../rag/pipeline.js";
import { questionFrom } from "../parse.js";

export async function runRetrieveCommand(args: string[], pipeline: RagPipeline): Promise<void> {
  const question = questionFrom(args, "retrieve");
  const result = await pipeline.retrieve(question, true);

  const chunks = (result.chunks ?? []).map((c) => ({
    documentId: c.chunk.documentId,
    chunkIndex: c.chunk.chunkIndex,
    score: c.score,
    vectorSimilarity: c.vectorSimilarity,
    keywordScore: c.keywordScore,
    preview: c.chunk.text.slice(0, 150)
  }));
  process.stdout.write(
    `${JSON.stringify({ question: result.question, numChunks: result.numChunks, chunks, context: result.context }, null, 2)}\n`
  );
}
