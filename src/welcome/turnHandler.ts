// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import { Activity } from "@microsoft/agents-activity";
import registerDebug from "debug";
import { getUserKey, UserRecordStore } from "../state/userRecordStore";
import { renderReply } from "./replies";
import { toTurnEvent, InboundActivity, TurnEvent } from "./turnEvents";
import {
  createWelcomeUserRecord,
  FallbackResolver,
  processTurn,
  WelcomeUserRecord,
} from "./turnProcessor";

const debug = registerDebug("welcome-bot:turnHandler");
const debugError = registerDebug("welcome-bot:turnHandler:error");

export const APOLOGY_MESSAGE =
  "Sorry, something went wrong while preparing a reply. Please try again.";

/**
 * What the handler needs from a turn. `TurnContext` satisfies it.
 */
export interface TurnIO {
  readonly activity: InboundActivity;
  sendActivities(activities: Activity[]): Promise<unknown>;
}

interface TurnDecision {
  activities: Activity[];
  record: WelcomeUserRecord;
}

export interface TurnHandler {
  handle(turn: TurnIO): Promise<void>;
}

/**
 * Runs one turn: read the user record, decide, send, then save.
 * Members-added turns only greet and never touch the record.
 */
export class WelcomeTurnHandler implements TurnHandler {
  private readonly store: UserRecordStore;
  private readonly fallback: FallbackResolver;

  constructor(store: UserRecordStore, fallback: FallbackResolver) {
    this.store = store;
    this.fallback = fallback;
  }

  public async handle(turn: TurnIO): Promise<void> {
    const event = toTurnEvent(turn.activity);
    if (event === undefined) {
      debug(`Ignoring ${turn.activity.type} activity`);
      return;
    }

    const key = event.kind === "message" ? getUserKey(turn.activity) : undefined;
    const record =
      key === undefined ? undefined : await this.store.get(key, createWelcomeUserRecord);
    const decision = this.decide(event, record);

    if (decision.activities.length > 0) {
      await turn.sendActivities(decision.activities);
    }
    if (key !== undefined) {
      // Saved only once the replies are out.
      await this.store.save(key, decision.record);
    }
    debug(`${event.kind} turn: ${decision.activities.length} activities sent`);
  }

  private decide(event: TurnEvent, record: WelcomeUserRecord | undefined): TurnDecision {
    try {
      const outcome = processTurn(event, record, this.fallback);
      return {
        activities: outcome.replies.map((reply) => renderReply(reply)),
        record: outcome.record,
      };
    } catch (error: unknown) {
      debugError("Failed to prepare a reply: %O", error);
      return {
        activities: [renderReply({ kind: "text", text: APOLOGY_MESSAGE })],
        record: record ?? createWelcomeUserRecord(),
      };
    }
  }
}
