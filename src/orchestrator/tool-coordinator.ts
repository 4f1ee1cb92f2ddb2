import type { ToolInvocation, ToolMessage } from "../core/contracts/llm-protocol.js";
import { errorMessage, scopedLogger } from "../shared/index.js";
import { guardTool, isToolErrorMessage, unknownTool } from "../tools/guarded-tool.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { OutputChannel, ProgressReporter, Stage } from "../tools/types.js";

const log = scopedLogger("tools");

export interface RoundExecutionContext {
  registry: ToolRegistry;
  conversationId: string;
  credential?: string;
  progress: ProgressReporter;
  output: OutputChannel;
  toolTimeoutMs?: number;
  signal?: AbortSignal;
}

function formatArguments(raw: string): string {
  try {
    return JSON.stringify(JSON.parse(raw), null, 2);
  } catch {
    return raw;
  }
}

function writeArgumentsPreamble(stage: Stage, rawArguments: string): void {
  stage.appendContent("## Request arguments: \n");
  stage.appendContent(`\`\`\`json\n\r${formatArguments(rawArguments)}\n\r\`\`\`\n\r`);
  stage.appendContent("## Response: \n");
}

function detachedStage(name: string): Stage {
  return {
    name,
    appendContent() {},
    addAttachment() {},
    close() {},
  };
}

function openStageSafely(progress: ProgressReporter, name: string): Stage {
  try {
    return progress.openStage(name);
  } catch (err) {
    log.warn(`Failed to open stage '${name}', reporting disabled: ${errorMessage(err)}`);
    return detachedStage(name);
  }
}

function closeStageSafely(stage: Stage): void {
  try {
    stage.close();
  } catch (err) {
    log.warn(`Failed to close stage '${stage.name}': ${errorMessage(err)}`);
  }
}

async function executeInvocation(
  invocation: ToolInvocation,
  ctx: RoundExecutionContext,
): Promise<ToolMessage> {
  const stage = openStageSafely(ctx.progress, invocation.name);
  try {
    const tool = ctx.registry.lookup(invocation.name);
    if (tool && tool.showInStage !== false) {
      try {
        writeArgumentsPreamble(stage, invocation.arguments);
      } catch (err) {
        log.warn(`Failed to report arguments of '${invocation.name}': ${errorMessage(err)}`);
      }
    }

    const run = tool
      ? guardTool(tool, {
          timeoutMs: ctx.toolTimeoutMs,
          validate: (name, input) => ctx.registry.validate(name, input),
        })
      : unknownTool(ctx.registry.list());

    const result = await run(invocation, {
      conversationId: ctx.conversationId,
      credential: ctx.credential,
      stage,
      output: ctx.output,
      ...(ctx.signal ? { signal: ctx.signal } : {}),
    });

    if (isToolErrorMessage(result)) {
      log.warn(`${invocation.name} (${invocation.id}) failed: ${result.content}`);
    }
    return result;
  } finally {
    closeStageSafely(stage);
  }
}

/**
 * Runs every invocation of one round concurrently and waits for all of them.
 * The i-th result always answers the i-th invocation, whatever order they
 * finish in.
 */
export async function executeRound(
  invocations: readonly ToolInvocation[],
  ctx: RoundExecutionContext,
): Promise<ToolMessage[]> {
  log.log(`Dispatching ${invocations.length} invocation(s): ${invocations.map((i) => i.name).join(", ")}`);
  return Promise.all(invocations.map((invocation) => executeInvocation(invocation, ctx)));
}
