import { ValidationError } from "../common/errors";
import { MAX_SCENES, type PipelineState } from "./pipeline-state";

/** Accepted scene texts by scene number, plus the latest pipeline state. */
export type StorySession = {
  readonly scenes: ReadonlyMap<number, string>;
  readonly latest?: PipelineState;
};

export const EMPTY_SESSION: StorySession = { scenes: new Map() };

export function isSessionComplete(session: StorySession): boolean {
  return session.scenes.size === MAX_SCENES;
}

export function orderedScenes(
  session: StorySession,
): Array<{ sceneNumber: number; text: string }> {
  return [...session.scenes.entries()]
    .sort(([a], [b]) => a - b)
    .map(([sceneNumber, text]) => ({ sceneNumber, text }));
}

/**
 * Returns a new session with slot `sceneNumber` written. Slots must stay
 * contiguous from 1, so only an existing slot or the next one may be written.
 */
export function withScene(
  session: StorySession,
  state: PipelineState,
): StorySession {
  const n = state.sceneNumber;
  if (n < 1 || n > MAX_SCENES || n > session.scenes.size + 1) {
    throw new ValidationError(
      `Scene ${n} cannot be stored after ${session.scenes.size} scene(s)`,
    );
  }
  const scenes = new Map(session.scenes);
  scenes.set(n, state.scene);
  return { scenes, latest: state };
}

/**
 * Plain-text story: optional title, then `Scene {n}` sections separated by
 * a `---` rule.
 */
export function exportStory(session: StorySession, title?: string): string {
  if (!isSessionComplete(session)) {
    throw new ValidationError(
      `Story has ${session.scenes.size} of ${MAX_SCENES} scenes; finish it before exporting.`,
    );
  }
  const body = orderedScenes(session)
    .map((s) => `Scene ${s.sceneNumber}\n\n${s.text}`)
    .join("\n\n---\n\n");
  const heading = title?.trim();
  return heading ? `${heading}\n\n${body}` : body;
}

/** One line per stored scene: number, word count and an opening excerpt. */
export function renderStoryOutline(session: StorySession, excerptChars = 60): string {
  return orderedScenes(session)
    .map((s) => {
      const flat = s.text.replace(/\s+/g, " ").trim();
      const words = flat === "" ? 0 : flat.split(" ").length;
      const excerpt =
        flat.length > excerptChars ? `${flat.slice(0, excerptChars)}…` : flat;
      return `Scene ${s.sceneNumber} (${words} words): ${excerpt}`;
    })
    .join("\n");
}
