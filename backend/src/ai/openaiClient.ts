// backend/src/ai/openaiClient.ts

import OpenAI from "openai";
import { getAITimeoutMs, getOpenAIModel } from "../config/quizConfig";
import { logServerError } from "../utils/logger";

let client: OpenAI | null = null;

function getClient(): OpenAI {
  if (!client) {
    if (!process.env.OPENAI_API_KEY) {
      throw new Error("OPENAI_API_KEY is not set");
    }
    // Retries are the caller's concern; a timed-out call fails the transition.
    client = new OpenAI({
      apiKey: process.env.OPENAI_API_KEY,
      timeout: getAITimeoutMs(),
      maxRetries: 0,
    });
  }
  return client;
}

// Raw model text for one MCQ. Parsing happens in the question source.
export async function generateQuestionJSON(prompt: string): Promise<string> {
  try {
    const response = await getClient().responses.create({
      model: getOpenAIModel(),
      input: [
        {
          role: "system",
          content: "You output ONLY valid JSON. No markdown, No extra text. Follow the schema exactly.",
        },
        { role: "user", content: prompt },
      ],
      temperature: 0.7,
      max_output_tokens: 600,
    });

    return response.output_text || "";
  } catch (err) {
    logServerError("openai.generateQuestionJSON", err);
    throw err;
  }
}

export async function generateFeedbackText(prompt: string): Promise<string> {
  try {
    const response = await getClient().responses.create({
      model: getOpenAIModel(),
      input: [
        {
          role: "system",
          content: "You are a friendly, patient tutor. Keep feedback short, clear and encouraging.",
        },
        { role: "user", content: prompt },
      ],
      temperature: 0.4,
      max_output_tokens: 250,
    });

    return response.output_text || "";
  } catch (err) {
    logServerError("openai.generateFeedbackText", err);
    throw err;
  }
}
