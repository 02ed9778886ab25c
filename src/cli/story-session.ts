import type { StoryFlowController } from "../application/story/story-flow";
import { ValidationError } from "../domain/common/errors";
import { MAX_SCENES } from "../domain/story/pipeline-state";
import {
  isSessionComplete,
  renderStoryOutline,
} from "../domain/story/session";

export type StoryIo = {
  ask(question: string): Promise<string>;
  print(text: string): void;
};

export type StorySessionOptions = {
  prompt?: string;
  title?: string;
  /** Accept every scene without asking */
  auto?: boolean;
};

export type StorySessionResult =
  | { outcome: "exported"; text: string }
  | { outcome: "quit"; scenes: number };

const MENU =
  "[a] accept & continue  [r] regenerate  [e] make custom changes  [q] quit";

function showScene(io: StoryIo, sceneNumber: number, scene: string, title?: string) {
  io.print("---");
  io.print(`Scene ${sceneNumber}`);
  if (title) io.print(title);
  io.print("");
  io.print(scene);
  io.print("---");
}

/**
 * Terminal rendition of the story builder: generate scene 1, then loop on
 * accept / regenerate / rewrite until the story is complete or the writer
 * quits.
 */
export async function runStorySession(
  flow: StoryFlowController,
  io: StoryIo,
  options: StorySessionOptions = {},
): Promise<StorySessionResult> {
  let prompt = options.prompt?.trim() ?? "";
  while (prompt === "") {
    prompt = (await io.ask("Story prompt: ")).trim();
    if (prompt === "") io.print("Enter a story prompt first.");
  }

  io.print("Generating scene 1...");
  let state = await flow.start(prompt);

  for (;;) {
    showScene(io, state.sceneNumber, state.scene, options.title);

    const choice = options.auto
      ? "a"
      : (await io.ask(`${MENU}\n> `)).trim().toLowerCase();

    if (choice === "q") {
      // A three-scene story is finished; quitting still exports it.
      if (!isSessionComplete(flow.session)) {
        return { outcome: "quit", scenes: flow.session.scenes.size };
      }
      break;
    }

    if (choice === "r") {
      io.print("Regenerating...");
      state = await flow.regenerate();
      continue;
    }

    if (choice === "e") {
      const changes = await io.ask("Describe changes: ");
      if (changes.trim() === "") {
        io.print("No changes given.");
        continue;
      }
      io.print("Rewriting...");
      state = await flow.rewrite(changes);
      continue;
    }

    if (choice !== "a") {
      io.print(`Unknown choice "${choice}".`);
      continue;
    }

    if (state.sceneNumber < MAX_SCENES) {
      io.print(`Generating scene ${state.sceneNumber + 1}...`);
    }
    const status = await flow.acceptAndContinue();
    if (status.kind === "complete") break;
    const latest = flow.session.latest;
    if (!latest) throw new ValidationError("Story session lost its latest scene");
    state = latest;
  }

  io.print("Story complete!");
  io.print(renderStoryOutline(flow.session));
  if (!isSessionComplete(flow.session)) {
    return { outcome: "quit", scenes: flow.session.scenes.size };
  }
  return { outcome: "exported", text: flow.export(options.title) };
}
