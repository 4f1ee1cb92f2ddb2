import type { LlmProvider } from "../../core/contracts/provider.js";
import type { Attachment, ChatMessage, LlmTurnInput } from "../../core/contracts/llm-protocol.js";
import { requireString } from "../arguments.js";
import type { Tool, ToolCallContext, ToolReply } from "../types.js";

export interface DeploymentToolOptions {
  provider: LlmProvider;
  /** Model or gateway deployment the prompt is sent to. */
  deployment: string;
  name: string;
  description: string;
  parameters: Record<string, unknown>;
  systemPrompt?: string;
  /** Fixed request fields such as temperature or top_p. */
  requestParameters?: Record<string, unknown>;
}

/**
 * Sends `prompt` as a single user message to the deployment. Every other
 * argument travels as `custom_fields.configuration`. Streamed text goes to the
 * invocation's stage, streamed attachments to the stage and the reply.
 */
export async function runDeployment(
  options: DeploymentToolOptions,
  context: ToolCallContext,
): Promise<ToolReply> {
  const prompt = requireString(context.args, "prompt");
  const configuration: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context.args)) {
    if (key !== "prompt") configuration[key] = value;
  }

  const messages: ChatMessage[] = [];
  if (options.systemPrompt) {
    messages.push({ role: "system", content: options.systemPrompt });
  }
  messages.push({ role: "user", content: prompt });

  const input: LlmTurnInput = {
    messages,
    model: options.deployment,
    extraBody: {
      ...options.requestParameters,
      custom_fields: { configuration },
    },
    signal: context.signal,
  };
  if (context.credential) input.credential = context.credential;

  let content = "";
  const attachments: Attachment[] = [];
  for await (const chunk of options.provider.streamTurn(input)) {
    const delta = chunk.delta;
    if (!delta) continue;
    if (delta.content) {
      context.stage.appendContent(delta.content);
      content += delta.content;
    }
    for (const attachment of delta.attachments ?? []) {
      attachments.push(attachment);
      context.stage.addAttachment(attachment);
    }
  }

  return { content, attachments };
}

export function createDeploymentTool(options: DeploymentToolOptions): Tool {
  return {
    name: options.name,
    description: options.description,
    parameters: options.parameters,
    execute: (context) => runDeployment(options, context),
  };
}
