import { z } from "zod";

export const LogLevelSchema = z
  .enum(["silent", "error", "warn", "info", "debug"])
  .default("warn");

export const ProviderNvidiaSchema = z.object({
  apiKey: z.string().min(1, "NVIDIA_API_KEY is required"),
  baseUrl: z.string().url().default("https://integrate.api.nvidia.com/v1"),
  timeoutMs: z.number().int().positive().default(120_000),
  maxRetries: z.number().int().min(0).default(2),
});

export const GenerationSchema = z.object({
  model: z.string().min(1).default("meta/llama-3.1-8b-instruct"),
  temperature: z.number().min(0).max(2).default(0.7),
  topP: z.number().gt(0).max(1).default(0.9),
  maxTokens: z.number().int().positive().default(200),
});

export const EmbeddingsSchema = z.object({
  model: z.string().min(1).default("nvidia/nv-embed-v1"),
  /** Seconds a computed embedding is reused for identical text */
  cacheTtlSeconds: z.number().int().positive().default(300),
});

export const CharacterDbSchema = z.object({
  path: z.string().min(1).default(".story-spark/lancedb"),
  table: z.string().min(1).default("characters"),
  /** Seconds list/lookup results are served from memory */
  cacheTtlSeconds: z.number().int().positive().default(60),
});

export const StorySchema = z.object({
  retrievalTopK: z.number().int().positive().default(3),
});

export const AppConfigSchema = z.object({
  logLevel: LogLevelSchema,
  providers: z.object({
    nvidia: ProviderNvidiaSchema,
  }),
  generation: GenerationSchema.default({}),
  embeddings: EmbeddingsSchema.default({}),
  characterDb: CharacterDbSchema.default({}),
  story: StorySchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type GenerationConfig = z.infer<typeof GenerationSchema>;
