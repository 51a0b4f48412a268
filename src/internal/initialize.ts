// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import { Activity } from "@microsoft/agents-activity";
import {
  AgentApplication,
  AuthConfiguration,
  loadAuthConfigFromEnv,
  CloudAdapter,
  MemoryStorage,
  Storage,
  TurnState,
} from "@microsoft/agents-hosting";
import { LocalFileStorage } from "../state/localStorage";
import { StorageUserRecordStore } from "../state/userRecordStore";
import { OrderCardSource } from "../welcome/orderCards";
import { WelcomeTurnHandler } from "../welcome/turnHandler";
import { resolveOrderLookup } from "../welcome/turnProcessor";
import { createWelcomeBot } from "../welcomeBot";
import { AppConfig } from "./config";

export const TURN_ERROR_MESSAGE = "Sorry, something went wrong. Please try again later.";

/**
 * The parts of `TurnContext` the turn error handler uses.
 */
export interface TurnErrorContext {
  readonly activity: Pick<Activity, "type">;
  sendTraceActivity(
    name: string,
    value?: unknown,
    valueType?: string,
    label?: string
  ): Promise<unknown>;
  sendActivity(text: string): Promise<unknown>;
}

export async function handleTurnError(context: TurnErrorContext, error: Error): Promise<void> {
  // This check writes out errors to console.
  console.error(`[onTurnError] unhandled error`, error);

  // Only reply to user messages so the bot doesn't spam a channel or chat.
  if (context.activity.type === "message") {
    // Send a trace activity, which will be displayed in Bot Framework Emulator
    await context.sendTraceActivity(
      "OnTurnError Trace",
      error.message,
      "https://www.botframework.com/schemas/error",
      "TurnError"
    );

    await context.sendActivity(TURN_ERROR_MESSAGE);
  }
}

export const authConfig: AuthConfiguration = loadAuthConfigFromEnv();
// Create adapter
export const adapter = new CloudAdapter(authConfig);
adapter.onTurnError = handleTurnError;

export interface WelcomeApp {
  orderCards: OrderCardSource;
  welcomeBot: AgentApplication<TurnState>;
}

export function createWelcomeApp(config: AppConfig): WelcomeApp {
  const userStorage: Storage =
    config.stateStore === "file"
      ? new LocalFileStorage(config.stateStoreDir, config.stateStoreFileName)
      : new MemoryStorage();

  const orderCards = new OrderCardSource({
    referencePath: config.orderReferencePath,
    templatePath: config.orderCardTemplatePath,
  });

  const turnHandler = new WelcomeTurnHandler(
    new StorageUserRecordStore(userStorage),
    (text) => resolveOrderLookup(text, orderCards.current(), config.orderDisplayId)
  );

  return {
    orderCards,
    welcomeBot: createWelcomeBot(turnHandler),
  };
}
