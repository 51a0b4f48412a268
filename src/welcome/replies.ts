// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import { Activity, ActionTypes, Attachment, CardAction } from "@microsoft/agents-activity";
import { CardFactory, MessageFactory } from "@microsoft/agents-hosting";
import { IntroCard } from "./introCard";
import { AdaptiveCardPayload } from "./orderCards";

/**
 * A reply decided by the turn processor, independent of any channel.
 */
export type Reply =
  | { kind: "text"; text: string }
  | { kind: "introCard"; card: IntroCard }
  | { kind: "adaptiveCard"; card: AdaptiveCardPayload };

function renderIntroCard(card: IntroCard): Attachment {
  const buttons: CardAction[] = card.actions.map((action) => ({
    type: ActionTypes.OpenUrl,
    title: action.title,
    text: action.title,
    displayText: action.title,
    value: action.url,
  }));
  return CardFactory.heroCard(card.title, card.text, [card.imageUrl], buttons);
}

export function renderReply(reply: Reply): Activity {
  switch (reply.kind) {
    case "text":
      return MessageFactory.text(reply.text);
    case "introCard":
      return MessageFactory.attachment(renderIntroCard(reply.card));
    case "adaptiveCard":
      return MessageFactory.attachment(CardFactory.adaptiveCard(reply.card));
  }
}
