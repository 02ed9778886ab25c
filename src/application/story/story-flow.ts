import { ValidationError } from "../../domain/common/errors";
import {
  MAX_SCENES,
  createPipelineState,
  type PipelineState,
} from "../../domain/story/pipeline-state";
import {
  EMPTY_SESSION,
  exportStory,
  withScene,
  type StorySession,
} from "../../domain/story/session";
import { silentLogger, type Logger } from "../../infrastructure/logging/logger";
import type { SceneGenerationStage } from "./scene-generation-stage";
import type { ScenePipeline } from "./scene-pipeline";

export type StoryStatus =
  | { kind: "not_started" }
  | { kind: "scene_ready"; sceneNumber: number }
  | { kind: "complete" };

/**
 * Drives one story through its scenes:
 *
 *   not_started --start--> scene_ready(1)
 *   scene_ready(n) --acceptAndContinue--> scene_ready(n+1)   (n < MAX_SCENES)
 *   scene_ready(n) --regenerate|rewrite--> scene_ready(n)
 *   scene_ready(MAX_SCENES) --acceptAndContinue--> complete
 *
 * Writes only ever touch the current slot; earlier scenes are kept until
 * `start` or `reset`.
 */
export class StoryFlowController {
  private readonly pipeline: ScenePipeline;
  private readonly generator: SceneGenerationStage;
  private readonly logger: Logger;
  private current: StorySession = EMPTY_SESSION;
  private completed = false;

  constructor(params: {
    pipeline: ScenePipeline;
    generator: SceneGenerationStage;
    logger?: Logger;
  }) {
    this.pipeline = params.pipeline;
    this.generator = params.generator;
    this.logger = params.logger ?? silentLogger;
  }

  get status(): StoryStatus {
    if (this.completed) return { kind: "complete" };
    const latest = this.current.latest;
    if (!latest) return { kind: "not_started" };
    return { kind: "scene_ready", sceneNumber: latest.sceneNumber };
  }

  get session(): StorySession {
    return this.current;
  }

  async start(prompt: string): Promise<PipelineState> {
    const premise = prompt.trim();
    if (premise === "") {
      throw new ValidationError("Enter a story prompt first.");
    }
    this.reset();
    this.logger.info("Generating scene 1");
    const result = await this.pipeline.run(
      createPipelineState({ prompt: premise, sceneNumber: 1 }),
    );
    return this.store(result);
  }

  async acceptAndContinue(): Promise<StoryStatus> {
    const latest = this.requireSceneReady("continue");
    if (latest.sceneNumber >= MAX_SCENES) {
      this.completed = true;
      this.logger.info("Story complete");
      return this.status;
    }
    const next = latest.sceneNumber + 1;
    this.logger.info(`Generating scene ${next}`);
    const result = await this.pipeline.run(
      createPipelineState({
        prompt: latest.prompt,
        retrieved: latest.retrieved,
        sceneNumber: next,
      }),
    );
    this.store(result);
    return this.status;
  }

  async regenerate(): Promise<PipelineState> {
    const latest = this.requireSceneReady("regenerate");
    this.logger.info(`Regenerating scene ${latest.sceneNumber}`);
    const result = await this.pipeline.run(
      createPipelineState({
        prompt: latest.prompt,
        retrieved: latest.retrieved,
        sceneNumber: latest.sceneNumber,
      }),
    );
    return this.store(result);
  }

  /** Applies free-text edits to the current scene; retrieval is skipped. */
  async rewrite(changes: string): Promise<PipelineState> {
    const latest = this.requireSceneReady("rewrite");
    if (changes.trim() === "") {
      throw new ValidationError("Describe the changes to apply.");
    }
    this.logger.info(`Rewriting scene ${latest.sceneNumber}`);
    const scene = await this.generator.rewrite(latest.scene, changes);
    return this.store({ ...latest, scene });
  }

  export(title?: string): string {
    return exportStory(this.current, title);
  }

  reset(): void {
    this.current = EMPTY_SESSION;
    this.completed = false;
  }

  private store(state: PipelineState): PipelineState {
    this.current = withScene(this.current, state);
    return state;
  }

  private requireSceneReady(action: string): PipelineState {
    if (this.completed) {
      throw new ValidationError(`Cannot ${action}: the story is complete.`);
    }
    const latest = this.current.latest;
    if (!latest) {
      throw new ValidationError(`Cannot ${action}: no scene has been generated yet.`);
    }
    return latest;
  }
}
