import { GoogleGenerativeAIEmbeddings } from "@langchain/google-genai";

import type { Settings } from "../../config/settings.js";

export function createEmbeddings(
  settings: Pick<Settings, "googleApiKey" | "embeddingModel">
): GoogleGenerativeAIEmbeddings {
  return new GoogleGenerativeAIEmbeddings({
    apiKey: settings.googleApiKey,
    modelName: settings.embeddingModel,
    stripNewLines: false
  });
}
