// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

export interface IntroCardAction {
  title: string;
  url: string;
}

export interface IntroCard {
  title: string;
  text: string;
  imageUrl: string;
  actions: IntroCardAction[];
}

export const introCard: Readonly<IntroCard> = Object.freeze({
  title: "Welcome to Bot Framework!",
  text:
    "Welcome to Welcome Users bot sample! This Introduction card " +
    "is a great way to introduce your Bot to the user and suggest " +
    "some things to get them started. We use this opportunity to " +
    "recommend a few next steps for learning more creating and deploying bots.",
  imageUrl: "https://aka.ms/bf-welcome-card-image",
  actions: [
    {
      title: "Get an overview",
      url: "https://docs.microsoft.com/en-us/azure/bot-service/?view=azure-bot-service-4.0",
    },
    {
      title: "Ask a question",
      url: "https://stackoverflow.com/questions/tagged/botframework",
    },
    {
      title: "Learn how to deploy",
      url: "https://docs.microsoft.com/en-us/azure/bot-service/bot-builder-howto-deploy-azure?view=azure-bot-service-4.0",
    },
  ],
});
