// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import { ConfigurationLoadError } from "./errors";
import { introCard } from "./introCard";
import { buildOrderCard, OrderLookupResult } from "./orderCards";
import { Reply } from "./replies";
import { MemberIdentity, TurnEvent } from "./turnEvents";

export const WELCOME_MESSAGE = "This is a simple Welcome Bot sample.";

export const FIRST_WELCOME_MESSAGE =
  "You are seeing this message because this was your first message ever to this bot.";

export const INVALID_ID_MESSAGE = "Invalid Id";

export const LOOKUP_UNAVAILABLE_MESSAGE =
  "Order lookup is temporarily unavailable. Please try again later.";

export interface WelcomeUserRecord {
  welcomed: boolean;
}

export function createWelcomeUserRecord(): WelcomeUserRecord {
  return { welcomed: false };
}

export function personalWelcome(senderName: string): string {
  return `Welcome ${senderName}.`;
}

export interface MessageTurn {
  text: string;
  senderName: string;
}

export interface TurnOutcome {
  replies: Reply[];
  record: WelcomeUserRecord;
}

/**
 * Produces the reply for text that matches no command.
 */
export type FallbackResolver = (text: string) => Reply;

export type Command = "acknowledge" | "intro" | "lookup";

const commandTable: ReadonlyMap<string, Command> = new Map<string, Command>([
  ["hello", "acknowledge"],
  ["hi", "acknowledge"],
  ["intro", "intro"],
  ["help", "intro"],
]);

/**
 * Total over all input: anything outside the table is a lookup.
 */
export function matchCommand(lowercasedText: string): Command {
  return commandTable.get(lowercasedText) ?? "lookup";
}

export function handleMembersAdded(
  members: ReadonlyArray<MemberIdentity>,
  selfId: string
): Reply[] {
  return members
    .filter((member) => member.id !== selfId)
    .map((member): Reply => ({
      kind: "text",
      text: `Hi there - ${member.displayName}. ${WELCOME_MESSAGE}`,
    }));
}

export function handleMessage(
  record: WelcomeUserRecord | undefined,
  message: MessageTurn,
  fallback: FallbackResolver
): TurnOutcome {
  const current = record ?? createWelcomeUserRecord();

  if (!current.welcomed) {
    return {
      replies: [
        { kind: "text", text: FIRST_WELCOME_MESSAGE },
        { kind: "text", text: personalWelcome(message.senderName) },
      ],
      record: { ...current, welcomed: true },
    };
  }

  // Utterances are hardcoded; anything smarter belongs to a language understanding service.
  const text = message.text.toLowerCase();
  switch (matchCommand(text)) {
    case "acknowledge":
      return { replies: [{ kind: "text", text: `You said ${text}` }], record: current };
    case "intro":
      return { replies: [{ kind: "introCard", card: introCard }], record: current };
    case "lookup":
      return { replies: [fallback(message.text)], record: current };
  }
}

/**
 * Match `text` verbatim against the reference id and build the order card on a hit.
 */
export function resolveOrderLookup(
  text: string,
  result: OrderLookupResult,
  displayId: string
): Reply {
  if (!result.ok) {
    return { kind: "text", text: LOOKUP_UNAVAILABLE_MESSAGE };
  }
  if (text !== result.lookup.referenceId) {
    return { kind: "text", text: INVALID_ID_MESSAGE };
  }

  try {
    return { kind: "adaptiveCard", card: buildOrderCard(result.lookup, displayId) };
  } catch (error: unknown) {
    if (error instanceof ConfigurationLoadError) {
      return { kind: "text", text: LOOKUP_UNAVAILABLE_MESSAGE };
    }
    throw error;
  }
}

export function processTurn(
  event: TurnEvent,
  record: WelcomeUserRecord | undefined,
  fallback: FallbackResolver
): TurnOutcome {
  switch (event.kind) {
    case "membersAdded":
      return {
        replies: handleMembersAdded(event.members, event.selfId),
        record: record ?? createWelcomeUserRecord(),
      };
    case "message":
      return handleMessage(
        record,
        { text: event.text, senderName: event.sender.displayName },
        fallback
      );
  }
}
