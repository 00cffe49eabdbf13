import { GoogleGenerativeAIEmbeddings } from "@langchain/google-genai";

import type { Settings } from "../../config/settings.js";

export function createGeminiEmbeddings(settings: Settings): GoogleGenerativeAIEmbeddings {
  return new GoogleGenerativeAIEmbeddings({
    apiKey: settings.googleApiKey,
    model: settings.embeddingModel
  });
}
