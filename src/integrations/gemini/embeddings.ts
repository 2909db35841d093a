import { GoogleGenerativeAIEmbeddings } from "@langchain/google-genai";

import { requireGoogleApiKey, type Settings } from "../../config/settings.js";

export function createEmbeddings(settings: Settings): GoogleGenerativeAIEmbeddings {
  return new GoogleGenerativeAIEmbeddings({
    apiKey: requireGoogleApiKey(settings),
    model: settings.embeddingModel
  });
}
