import type { LlmProvider } from "../../core/contracts/provider.js";
import type { Tool } from "../types.js";
import { runDeployment, type DeploymentToolOptions } from "./deployment-tool.js";

export const IMAGE_GENERATION_TOOL_NAME = "image_generation_tool";
export const IMAGE_SHOWN_MESSAGE =
  "The image has been successfully generated according to request and shown to user!";

const RENDERABLE_IMAGE_TYPES = new Set(["image/png", "image/jpeg"]);

const DESCRIPTION = [
  "# Image generator",
  "Generates image based on the provided description.",
  "## Instructions:",
  "- Use that tool when user asks to generate an image based on the description or to visualize some text or information.",
  "- Choose the best size from available options based on user request or image type. For specific size requests, use the closest supported option.",
  "- When the tool returns a markdown image URL, always include it in your response and follow it with a brief description.",
  "## Restrictions:",
  "- Never use this tool for data or numerical information visualization.",
].join("\n");

const PARAMETERS: Record<string, unknown> = {
  type: "object",
  properties: {
    prompt: {
      type: "string",
      description: "Extensive description of the image that should be generated.",
    },
    size: {
      type: "string",
      description: "The size of the generated image.",
      enum: ["1024x1024", "1024x1792", "1792x1024"],
      default: "1024x1024",
    },
    style: {
      type: "string",
      description:
        "The style of the generated image. Must be one of `vivid` or `natural`. \n- `vivid` causes the model to lean towards generating hyperrealistic and dramatic images. \n- `natural` causes the model to produce more natural, less realistic looking images.",
      enum: ["natural", "vivid"],
      default: "natural",
    },
    quality: {
      type: "string",
      description:
        "The quality of the image that will be generated. 'hd' creates images with finer details and greater consistency across the image.",
      enum: ["standard", "hd"],
      default: "standard",
    },
  },
  required: ["prompt"],
};

export interface ImageGenerationToolOptions {
  provider: LlmProvider;
  deployment?: string;
}

export function createImageGenerationTool(options: ImageGenerationToolOptions): Tool {
  const deployment: DeploymentToolOptions = {
    provider: options.provider,
    deployment: options.deployment ?? "dall-e-3",
    name: IMAGE_GENERATION_TOOL_NAME,
    description: DESCRIPTION,
    parameters: PARAMETERS,
  };

  return {
    name: deployment.name,
    description: deployment.description,
    parameters: deployment.parameters,
    async execute(context) {
      const reply = await runDeployment(deployment, context);
      const attachments = reply.attachments ?? [];
      if (attachments.length === 0) return reply;

      for (const attachment of attachments) {
        if (attachment.url && attachment.type && RENDERABLE_IMAGE_TYPES.has(attachment.type)) {
          context.output.appendContent(`\n\r![image](${attachment.url})\n\r`);
        }
      }

      // Tells the model the picture is already on screen.
      return reply.content.length > 0 ? reply : { ...reply, content: IMAGE_SHOWN_MESSAGE };
    },
  };
}
