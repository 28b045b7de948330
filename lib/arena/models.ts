import type { Model } from "./types";

/**
 * Default battle pool. Ids are the identifiers the chat-completions
 * endpoint expects.
 */
export const DEFAULT_MODELS: Model[] = [
  { id: "codellama:latest", name: "Code Llama", category: "code", contextLength: 16_384 },
  { id: "deepseek-r1:14b", name: "DeepSeek R1 14B", category: "reasoning", contextLength: 131_072 },
  { id: "gemma3:12b", name: "Gemma 3 12B", category: "general", contextLength: 131_072 },
  { id: "llama3.1:70b-instruct-q4_K_M", name: "Llama 3.1 70B Instruct", category: "general", contextLength: 131_072 },
  { id: "llava:latest", name: "LLaVA", category: "vision", contextLength: 4_096 },
  { id: "mistral:latest", name: "Mistral 7B", category: "general", contextLength: 32_768 },
  { id: "phi4:latest", name: "Phi-4", category: "reasoning", contextLength: 16_384 },
  { id: "qwen2.5:72b", name: "Qwen 2.5 72B", category: "general", contextLength: 131_072 },
];
