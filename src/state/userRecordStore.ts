// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import { Storage, StoreItems } from "@microsoft/agents-hosting";
import { z } from "zod";
import { StateAccessError } from "../welcome/errors";
import { InboundActivity } from "../welcome/turnEvents";
import { WelcomeUserRecord } from "../welcome/turnProcessor";

export interface UserRecordStore {
  get(key: string, defaultFactory: () => WelcomeUserRecord): Promise<WelcomeUserRecord>;
  save(key: string, record: WelcomeUserRecord): Promise<void>;
}

const storedRecordSchema = z.object({
  welcomed: z.boolean(),
});

/**
 * Same layout the SDK's user state uses: one entry per user per channel.
 */
export function getUserKey(activity: Pick<InboundActivity, "channelId" | "from">): string {
  const channelId = activity.channelId;
  const userId = activity.from?.id;
  if (!channelId || !userId) {
    throw new StateAccessError("Missing activity.channelId or activity.from.id.");
  }
  return `${channelId}/users/${userId}`;
}

/**
 * {@link UserRecordStore} over any Agents SDK `Storage`.
 */
export class StorageUserRecordStore implements UserRecordStore {
  private readonly storage: Storage;

  constructor(storage: Storage) {
    this.storage = storage;
  }

  public async get(
    key: string,
    defaultFactory: () => WelcomeUserRecord
  ): Promise<WelcomeUserRecord> {
    let items: StoreItems;
    try {
      items = await this.storage.read([key]);
    } catch (error: unknown) {
      throw new StateAccessError(`Failed to read user state for ${key}.`, key, { cause: error });
    }

    const stored: unknown = items[key];
    if (stored === undefined) {
      return defaultFactory();
    }

    // A corrupt entry must not reset the user to "not welcomed".
    const result = storedRecordSchema.safeParse(stored);
    if (!result.success) {
      throw new StateAccessError(`Stored user state for ${key} is malformed.`, key, {
        cause: result.error,
      });
    }
    return { welcomed: result.data.welcomed };
  }

  public async save(key: string, record: WelcomeUserRecord): Promise<void> {
    try {
      await this.storage.write({ [key]: { ...record, eTag: "*" } });
    } catch (error: unknown) {
      throw new StateAccessError(`Failed to write user state for ${key}.`, key, { cause: error });
    }
  }
}
