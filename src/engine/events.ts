import type { AssistantMessage, Attachment } from "../core/contracts/llm-protocol.js";
import type { ConversationState } from "../orchestrator/state.js";

interface RequestScoped {
  requestId?: string;
}

export type EngineEvent = RequestScoped &
  (
    | { type: "delta"; content: string }
    | { type: "attachment"; attachment: Attachment }
    | { type: "stage_open"; stageId: string; name: string }
    | { type: "stage_content"; stageId: string; content: string }
    | { type: "stage_attachment"; stageId: string; attachment: Attachment }
    | { type: "stage_close"; stageId: string }
    | { type: "reply"; message: AssistantMessage; state: ConversationState }
    | { type: "error"; message: string }
  );

export type EngineEventType = EngineEvent["type"];
