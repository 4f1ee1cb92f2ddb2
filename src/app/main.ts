import { WsServer } from "../server/index.js";
import { loadSettings } from "../config/settings.js";
import { providerFactoryFor } from "../config/provider.js";
import { loadProvider } from "../core/index.js";
import { AgentEngine } from "../engine/index.js";
import { loadSystemPrompt } from "../prompts/system-prompt.js";
import { buildToolCatalog, type ToolCatalog } from "../tools/catalog.js";
import { HttpDocumentSource } from "../tools/files/document-source.js";
import { HttpFileStore } from "../tools/files/file-store.js";
import { StreamableHttpMcpClient } from "../tools/mcp/mcp-client.js";
import { ChunkedKeywordRetriever } from "../tools/rag/retriever.js";
import { devLog, devError, errorMessage } from "../shared/index.js";

export async function main(): Promise<void> {
  const settings = loadSettings();
  const provider = await loadProvider(providerFactoryFor(settings.provider));
  const systemPrompt = await loadSystemPrompt();
  const source = new HttpDocumentSource(settings.filesEndpoint);
  let catalog: ToolCatalog | null = null;

  const wsServer = new WsServer({
    port: settings.port,
    onMessage: (clientId, data) => engine.handleMessage(clientId, data),
    onDisconnect: (clientId) => engine.cancelClient(clientId),
  });
  const engine = new AgentEngine({
    provider,
    systemPrompt,
    onReply: wsServer.send.bind(wsServer),
    ...(settings.model ? { model: settings.model } : {}),
    maxRounds: settings.maxRounds,
    toolTimeoutMs: settings.toolTimeoutMs,
    loadTools: async () => {
      const built = await buildToolCatalog({
        provider,
        source,
        retriever: new ChunkedKeywordRetriever(),
        fileStore: new HttpFileStore(settings.filesEndpoint),
        ...(settings.model ? { model: settings.model } : {}),
        imageDeployment: settings.imageDeployment,
        ...(settings.codeInterpreterUrl ? { codeInterpreterUrl: settings.codeInterpreterUrl } : {}),
        mcpServerUrls: settings.mcpServerUrls,
        connectMcp: (url) => StreamableHttpMcpClient.create(url),
      });
      catalog = built;
      return built.tools;
    },
  });

  await engine.start();
  await wsServer.start();

  devLog(`Agent ready: provider=${provider.name}, max rounds=${settings.maxRounds}`);

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    await wsServer.stop();
    await engine.idle();
    await catalog?.close();
    await engine.stop();
  };

  const onSignal = (): void => {
    void shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        devError("Shutdown failed:", errorMessage(err));
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}
