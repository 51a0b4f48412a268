// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import { ActivityTypes } from "@microsoft/agents-activity";
import { MemoryStorage } from "@microsoft/agents-hosting";
import { StorageUserRecordStore, UserRecordStore } from "../src/state/userRecordStore";
import { StateAccessError } from "../src/welcome/errors";
import { APOLOGY_MESSAGE, WelcomeTurnHandler } from "../src/welcome/turnHandler";
import { FallbackResolver, resolveOrderLookup } from "../src/welcome/turnProcessor";
import {
  ALEX,
  BOT,
  membersAddedActivity,
  messageActivity,
  RecordingStore,
  RecordingTurn,
  SAM,
  testOrderLookup,
} from "./testCore";

const DISPLAY_ID = "US|5722106988174";

const orderFallback: FallbackResolver = (text) =>
  resolveOrderLookup(text, { ok: true, lookup: testOrderLookup() }, DISPLAY_ID);

function sentTexts(turn: RecordingTurn): (string | undefined)[] {
  return turn.sent.map((activity) => activity.text);
}

describe("Welcome turn handler", () => {
  let store: UserRecordStore;
  let handler: WelcomeTurnHandler;

  beforeEach(() => {
    store = new StorageUserRecordStore(new MemoryStorage());
    handler = new WelcomeTurnHandler(store, orderFallback);
  });

  test("welcomes on the first message, then answers commands", async () => {
    const first = new RecordingTurn(messageActivity("hi"));
    await handler.handle(first);
    expect(sentTexts(first)).toEqual([
      "You are seeing this message because this was your first message ever to this bot.",
      "Welcome Alex.",
    ]);

    const second = new RecordingTurn(messageActivity("Hi"));
    await handler.handle(second);
    expect(sentTexts(second)).toEqual(["You said hi"]);
  });

  test("tracks each user separately", async () => {
    await handler.handle(new RecordingTurn(messageActivity("hello", ALEX)));
    const sam = new RecordingTurn(messageActivity("hello", SAM));
    await handler.handle(sam);
    expect(sentTexts(sam)).toEqual([
      "You are seeing this message because this was your first message ever to this bot.",
      "Welcome Sam.",
    ]);
    expect(await store.get("test/users/user-2", () => ({ welcomed: false }))).toEqual({
      welcomed: true,
    });
  });

  test("sends the order card for the reference id", async () => {
    await store.save("test/users/user-1", { welcomed: true });
    const turn = new RecordingTurn(messageActivity("FR-1001"));
    await handler.handle(turn);
    expect(turn.sent).toHaveLength(1);
    expect(turn.sent[0].attachments?.[0].contentType).toBe(
      "application/vnd.microsoft.card.adaptive"
    );
  });

  test("answers Invalid Id for anything else", async () => {
    await store.save("test/users/user-1", { welcomed: true });
    const turn = new RecordingTurn(messageActivity("foo"));
    await handler.handle(turn);
    expect(sentTexts(turn)).toEqual(["Invalid Id"]);
  });

  test("sends the intro card for help", async () => {
    await store.save("test/users/user-1", { welcomed: true });
    const turn = new RecordingTurn(messageActivity("help"));
    await handler.handle(turn);
    expect(turn.sent[0].attachments?.[0].contentType).toBe("application/vnd.microsoft.card.hero");
  });

  test("greets added members but not itself", async () => {
    const turn = new RecordingTurn(membersAddedActivity([BOT, SAM]));
    await handler.handle(turn);
    expect(sentTexts(turn)).toEqual(["Hi there - Sam. This is a simple Welcome Bot sample."]);
  });

  test("sends nothing when only the bot joins", async () => {
    const turn = new RecordingTurn(membersAddedActivity([BOT]));
    await handler.handle(turn);
    expect(turn.sent).toEqual([]);
  });

  test("reads once, sends, then saves once", async () => {
    const log: string[] = [];
    const recording = new WelcomeTurnHandler(new RecordingStore(store, log), orderFallback);
    await recording.handle(new RecordingTurn(messageActivity("hi"), log));
    await recording.handle(new RecordingTurn(messageActivity("hi"), log));
    expect(log).toEqual(["get", "send", "save", "get", "send", "save"]);
  });

  test("ignored activities never touch state", async () => {
    const log: string[] = [];
    const recording = new WelcomeTurnHandler(new RecordingStore(store, log), orderFallback);
    const turn = new RecordingTurn(
      { type: ActivityTypes.Typing, from: ALEX, recipient: BOT, channelId: "test" },
      log
    );
    await recording.handle(turn);
    expect(log).toEqual([]);
  });

  test("members-added turns greet without touching state", async () => {
    const log: string[] = [];
    const recording = new WelcomeTurnHandler(new RecordingStore(store, log), orderFallback);
    const turn = new RecordingTurn(
      {
        type: ActivityTypes.ConversationUpdate,
        membersAdded: [SAM],
        recipient: BOT,
        channelId: "test",
      },
      log
    );
    await recording.handle(turn);
    expect(sentTexts(turn)).toEqual(["Hi there - Sam. This is a simple Welcome Bot sample."]);
    expect(log).toEqual(["send"]);
  });

  test("a failing reply degrades to an apology and keeps the record", async () => {
    await store.save("test/users/user-1", { welcomed: true });
    const failing = new WelcomeTurnHandler(store, () => {
      throw new Error("card renderer failed");
    });
    const turn = new RecordingTurn(messageActivity("foo"));
    await failing.handle(turn);
    expect(sentTexts(turn)).toEqual([APOLOGY_MESSAGE]);
    expect(await store.get("test/users/user-1", () => ({ welcomed: false }))).toEqual({
      welcomed: true,
    });
  });

  test("a turn without a user id fails before sending", async () => {
    const turn = new RecordingTurn({
      type: ActivityTypes.Message,
      text: "hi",
      from: { id: "", name: "Nobody" },
      recipient: BOT,
      channelId: "test",
    });
    await expect(handler.handle(turn)).rejects.toBeInstanceOf(StateAccessError);
    expect(turn.sent).toEqual([]);
  });
});
