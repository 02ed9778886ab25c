import { z } from "zod";
import { ValidationError } from "../common/errors";

export const MAX_SCENES = 3;

/**
 * The record threaded through one pipeline run. Unknown fields are
 * rejected; every field has a default.
 */
export const PipelineStateSchema = z
  .object({
    /** Story premise; constant across one session */
    prompt: z.string().default(""),
    /** Rendered character context from the last retrieval */
    retrieved: z.string().default(""),
    scene: z.string().default(""),
    sceneNumber: z.number().int().min(1).max(MAX_SCENES).default(1),
    /** Reserved free-text channel */
    feedback: z.string().default(""),
  })
  .strict();

export type PipelineState = z.infer<typeof PipelineStateSchema>;
export type PipelineStateInput = z.input<typeof PipelineStateSchema>;

export function createPipelineState(input: PipelineStateInput = {}): PipelineState {
  const parsed = PipelineStateSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new ValidationError(`Invalid pipeline state:\n${issues}`, parsed.error);
  }
  return parsed.data;
}
