import cors from "cors";
import express from "express";
import { resolvePorts } from "../config/ports.js";
import { ChatService } from "./chat/chatService.js";
import { buildChatRouter } from "./chat/chatRouter.js";
import { buildEngineContext } from "./chat/engineContext.js";
import { loadEnvironmentFromDotenv, resolveAppConfig } from "./config/env.js";
import { installOutboundRequestLogger } from "./logging/httpLogging.js";

const envResult = loadEnvironmentFromDotenv();
const config = resolveAppConfig();
const port = resolvePorts().apiPort;
installOutboundRequestLogger({ enabled: config.logProviderHeaders });

const log = (line: string) => console.log(line);
const { engine, transport } = buildEngineContext(config, { log });
const chatService = new ChatService(engine, config.defaultModel);

const app = express();
app.use(cors());
app.use(express.json({ limit: "2mb" }));

app.get("/api/health", (_req, res) => {
  res.json({
    ok: true,
    transport: transport.name,
    defaultModel: config.defaultModel,
    conversationsDir: config.conversationsDir,
    hasApiKey: config.apiKey !== null,
  });
});

app.use("/api", buildChatRouter(chatService));

app.listen(port, () => {
  console.log(
    `[tally-chat] server listening on http://localhost:${port} (transport=${transport.name}, dotenv=${envResult.loaded ? "loaded" : "missing"})`,
  );
  console.log(
    `[tally-chat] conversations=${config.conversationsDir} defaultModel=${config.defaultModel} maxTokens=${config.maxTokens}`,
  );
});
