export type ProviderName = "nvidia";

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type LlmUsage = {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
};

export type ChatCompletionRequest = {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  topP?: number;
};

export type ChatCompletionResponse = {
  provider: ProviderName;
  model: string;
  content: string;
  finishReason?: string;
  usage?: LlmUsage;
};

export interface LlmClient {
  readonly provider: ProviderName;
  chatComplete(request: ChatCompletionRequest): Promise<ChatCompletionResponse>;
}
