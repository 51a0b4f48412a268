// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import { Activity, ActivityTypes, ChannelAccount } from "@microsoft/agents-activity";

/**
 * The slice of an incoming activity the welcome flow reads.
 */
export type InboundActivity = Pick<
  Activity,
  "type" | "text" | "from" | "recipient" | "membersAdded" | "channelId"
>;

export interface MemberIdentity {
  id: string;
  displayName: string;
}

export type TurnEvent =
  | {
      kind: "membersAdded";
      members: MemberIdentity[];
      selfId: string;
    }
  | {
      kind: "message";
      text: string;
      sender: MemberIdentity;
    };

/**
 * Channels may omit the display name; the account id stands in for it.
 */
export function toMemberIdentity(account: ChannelAccount | undefined): MemberIdentity {
  const id = account?.id ?? "";
  return {
    id,
    displayName: account?.name || id,
  };
}

/**
 * Classify an activity into the events the welcome flow reacts to.
 *
 * @returns `undefined` for activities the bot ignores.
 */
export function toTurnEvent(activity: InboundActivity): TurnEvent | undefined {
  if (activity.type === ActivityTypes.ConversationUpdate) {
    const membersAdded = activity.membersAdded ?? [];
    if (membersAdded.length === 0) {
      return undefined;
    }
    return {
      kind: "membersAdded",
      members: membersAdded.map((member) => toMemberIdentity(member)),
      selfId: activity.recipient?.id ?? "",
    };
  } else if (activity.type === ActivityTypes.Message) {
    return {
      kind: "message",
      text: activity.text ?? "",
      sender: toMemberIdentity(activity.from),
    };
  }

  return undefined;
}
