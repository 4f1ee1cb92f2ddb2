import type { Attachment, UserMessage } from "../contracts/llm-protocol.js";

function describeAttachment(attachment: Attachment): string | undefined {
  const parts: string[] = [];
  if (attachment.title) parts.push(`title: ${attachment.title}`);
  if (attachment.type) parts.push(`type: ${attachment.type}`);
  if (attachment.url) parts.push(`url: ${attachment.url}`);
  if (attachment.referenceUrl) parts.push(`reference_url: ${attachment.referenceUrl}`);
  return parts.length > 0 ? `- ${parts.join(", ")}` : undefined;
}

/**
 * Text a provider sends for a user message. Attachments are listed after the
 * content so the model can hand their urls to file tools; inline `data` is
 * not repeated.
 */
export function userMessageText(message: UserMessage): string {
  const lines = (message.attachments ?? [])
    .map(describeAttachment)
    .filter((line): line is string => line !== undefined);
  if (lines.length === 0) return message.content;
  return `${message.content}\n\nAttached files:\n${lines.join("\n")}`;
}
