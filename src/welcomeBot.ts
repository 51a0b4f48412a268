// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import { ActivityTypes } from "@microsoft/agents-activity";
import { AgentApplication, TurnContext, TurnState } from "@microsoft/agents-hosting";
import { TurnHandler } from "./welcome/turnHandler";

export function createWelcomeBot(handler: TurnHandler): AgentApplication<TurnState> {
  const welcomeBot = new AgentApplication<TurnState>();

  // Not every channel sends conversationUpdate, so a user may never see this greeting.
  welcomeBot.onConversationUpdate("membersAdded", async (context: TurnContext) => {
    await handler.handle(context);
  });

  welcomeBot.onActivity(ActivityTypes.Message, async (context: TurnContext) => {
    await handler.handle(context);
  });

  return welcomeBot;
}
