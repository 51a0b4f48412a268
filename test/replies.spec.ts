// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import { ActivityTypes } from "@microsoft/agents-activity";
import { introCard } from "../src/welcome/introCard";
import { renderReply } from "../src/welcome/replies";

describe("Reply rendering", () => {
  test("text becomes a message activity", () => {
    const activity = renderReply({ kind: "text", text: "Invalid Id" });
    expect(activity.type).toBe(ActivityTypes.Message);
    expect(activity.text).toBe("Invalid Id");
  });

  test("the intro card becomes a hero card with open-url buttons", () => {
    const activity = renderReply({ kind: "introCard", card: introCard });
    const attachment = activity.attachments?.[0];
    expect(attachment?.contentType).toBe("application/vnd.microsoft.card.hero");
    expect(attachment?.content).toMatchObject({
      title: "Welcome to Bot Framework!",
      images: [{ url: "https://aka.ms/bf-welcome-card-image" }],
      buttons: [
        {
          type: "openUrl",
          title: "Get an overview",
          value: "https://docs.microsoft.com/en-us/azure/bot-service/?view=azure-bot-service-4.0",
        },
        {
          type: "openUrl",
          title: "Ask a question",
          value: "https://stackoverflow.com/questions/tagged/botframework",
        },
        {
          type: "openUrl",
          title: "Learn how to deploy",
          value:
            "https://docs.microsoft.com/en-us/azure/bot-service/bot-builder-howto-deploy-azure?view=azure-bot-service-4.0",
        },
      ],
    });
  });

  test("an adaptive card is attached as is", () => {
    const card = {
      type: "AdaptiveCard" as const,
      body: [{ type: "TextBlock", text: "US|5722106988174" }],
    };
    const activity = renderReply({ kind: "adaptiveCard", card });
    expect(activity.type).toBe(ActivityTypes.Message);
    expect(activity.attachments).toHaveLength(1);
    expect(activity.attachments?.[0].contentType).toBe("application/vnd.microsoft.card.adaptive");
    expect(activity.attachments?.[0].content).toEqual(card);
  });
});
