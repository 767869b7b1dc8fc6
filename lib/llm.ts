import { ChatGoogleGenerativeAI } from "@langchain/google-genai";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { HumanMessage, AIMessage, type BaseMessage } from "@langchain/core/messages";
import type { AppConfig } from "./config";
import { ModelUnavailableError, errorMessage } from "./errors";

export interface Message {
  role: "user" | "assistant";
  content: string;
}

export function createChatModel(config: AppConfig): BaseChatModel {
  return new ChatGoogleGenerativeAI({
    model: config.model,
    temperature: config.temperature,
    apiKey: config.geminiApiKey,
    maxRetries: 1,
  });
}

function messageText(message: BaseMessage): string {
  const { content } = message;
  if (typeof content === "string") return content;

  return content
    .map((part) => (part.type === "text" && "text" in part ? String(part.text) : ""))
    .join("");
}

/**
 * Sends one prompt (after any prior turns) and returns the reply text.
 * Any failure of the call, including an empty reply, is a ModelUnavailableError.
 */
export async function chatWithLLM(
  llm: BaseChatModel,
  prompt: string,
  options: { history?: Message[]; timeoutMs?: number } = {}
): Promise<string> {
  const messages = (options.history ?? []).map((m) =>
    m.role == "user" ? new HumanMessage(m.content) : new AIMessage(m.content)
  );
  messages.push(new HumanMessage(prompt));

  let response: BaseMessage;
  try {
    response = await llm.invoke(messages, { timeout: options.timeoutMs });
  } catch (error) {
    console.error("LLM Error: ", error);
    throw new ModelUnavailableError(`Model call failed: ${errorMessage(error)}`, error);
  }

  const text = messageText(response).trim();
  if (!text) {
    throw new ModelUnavailableError("Model returned an empty response.");
  }
  return text;
}
