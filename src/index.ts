// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import "dotenv/config";
import express, { Request, Response } from "express";
import { authorizeJWT } from "@microsoft/agents-hosting";
import registerDebug from "debug";
import { loadAppConfig } from "./internal/config";
import { adapter, authConfig, createWelcomeApp } from "./internal/initialize";

const debug = registerDebug("welcome-bot:server");

async function main(): Promise<void> {
  const config = loadAppConfig();
  const { orderCards, welcomeBot } = createWelcomeApp(config);

  // Documents are loaded once, before the server accepts turns.
  const lookup = await orderCards.load();
  debug(`Order reference ${lookup.referenceId} loaded`);

  const server = express();
  server.use(express.json());
  server.use(authorizeJWT(authConfig));

  server.post("/api/messages", async (req: Request, res: Response) => {
    await adapter.process(req, res, async (context) => {
      await welcomeBot.run(context);
    });
  });

  server.listen(config.port, () => {
    console.log(`Welcome bot listening on port ${config.port} at /api/messages`);
  });
}

main().catch((error: unknown) => {
  console.error("[startup] welcome bot failed to start", error);
  process.exit(1);
});
