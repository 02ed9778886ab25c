import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import {
  createPipelineState,
  type PipelineState,
} from "../../domain/story/pipeline-state";
import type { RetrievalStage } from "./retrieval-stage";
import type { SceneGenerationStage } from "./scene-generation-stage";

const State = Annotation.Root({
  prompt: Annotation<string>(),
  retrieved: Annotation<string>(),
  scene: Annotation<string>(),
  sceneNumber: Annotation<number>(),
  feedback: Annotation<string>(),
});

type GraphState = typeof State.State;

function buildGraph(retrieval: RetrievalStage, generation: SceneGenerationStage) {
  const retrieveNode = async (state: GraphState) => ({
    retrieved: await retrieval.retrieve(state.prompt),
  });

  const generateSceneNode = async (state: GraphState) => ({
    scene: await generation.generate(
      state.sceneNumber,
      state.prompt,
      state.retrieved,
    ),
  });

  return new StateGraph(State)
    .addNode("retrieve", retrieveNode)
    .addNode("generateScene", generateSceneNode)
    .addEdge(START, "retrieve")
    .addEdge("retrieve", "generateScene")
    .addEdge("generateScene", END)
    .compile();
}

/**
 * retrieve → generateScene, once per generate/continue/regenerate action.
 * Each run works on its own copy of the state; the caller's object is
 * never touched.
 */
export class ScenePipeline {
  private readonly graph: ReturnType<typeof buildGraph>;

  constructor(params: {
    retrieval: RetrievalStage;
    generation: SceneGenerationStage;
  }) {
    this.graph = buildGraph(params.retrieval, params.generation);
  }

  async run(state: PipelineState): Promise<PipelineState> {
    const input = createPipelineState(state);
    const result = await this.graph.invoke({ ...input });
    return createPipelineState({
      prompt: result.prompt,
      retrieved: result.retrieved,
      scene: result.scene,
      sceneNumber: result.sceneNumber,
      feedback: result.feedback,
    });
  }
}
