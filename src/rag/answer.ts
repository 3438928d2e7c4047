import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { HumanMessage, SystemMessage } from "@langchain/core/messages";

import { DEFAULT_SYSTEM_PROMPT } from "../config/settings.js";
import { errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../logging/logger.js";

export const NO_CONTEXT_RESPONSE = "I don't have enough information to answer this question.";

const EXTERNAL_KNOWLEDGE_PHRASES = [
  "as far as i know",
  "based on my knowledge",
  "generally speaking",
  "typically",
  "in my experience"
];

export type GeneratedAnswer = {
  answer: string;
  hasContext: boolean;
  prompt?: string;
  error?: string;
};

export type AnswerValidation = {
  isValid: boolean;
  isNoContextResponse: boolean;
  issues: string[];
};

export function buildPrompt(question: string, context: string): string {
  return `CONTEXT:\n${context}\n\nQUESTION:\n${question}\n\nANSWER:`;
}

export function validateAnswer(answer: string): AnswerValidation {
  const issues: string[] = [];
  if (answer.length < 10) {
    issues.push("Answer is very short");
  }
  const lower = answer.toLowerCase();
  for (const phrase of EXTERNAL_KNOWLEDGE_PHRASES) {
    if (lower.includes(phrase)) {
      issues.push(`Possible external knowledge usage: '${phrase}'`);
    }
  }
  return {
    isValid: issues.length === 0,
    isNoContextResponse: answer.trim() === NO_CONTEXT_RESPONSE,
    issues
  };
}

/**
 * Answers strictly from retrieved context. This is the user-facing boundary, so model
 * failures come back as an error-shaped answer instead of a rejection.
 */
export class AnswerGenerator {
  private readonly logger: Logger;

  constructor(
    private readonly model: BaseChatModel,
    private readonly systemPrompt: string = DEFAULT_SYSTEM_PROMPT,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger("generation");
  }

  async generateAnswer(
    question: string,
    context: string,
    options: { returnPrompt?: boolean } = {}
  ): Promise<GeneratedAnswer> {
    if (!context.trim()) {
      this.logger.info("no context, returning fallback answer");
      return { answer: NO_CONTEXT_RESPONSE, hasContext: false };
    }

    const prompt = buildPrompt(question, context);
    try {
      const result = await this.model.invoke([
        new SystemMessage(this.systemPrompt),
        new HumanMessage(prompt)
      ]);
      const answer = result.text.trim();
      this.logger.info({ chars: answer.length }, "answer generated");

      const generated: GeneratedAnswer = { answer, hasContext: true };
      if (options.returnPrompt) {
        generated.prompt = prompt;
      }
      return generated;
    } catch (err: unknown) {
      const message = errorMessage(err);
      this.logger.error({ err }, "answer generation failed");
      return { answer: `Error generating answer: ${message}`, hasContext: true, error: message };
    }
  }
}
