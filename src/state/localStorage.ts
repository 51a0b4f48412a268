// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import { Storage, StoreItems } from "@microsoft/agents-hosting";
import * as fs from "fs";
import * as path from "path";

function isStoreItems(value: unknown): value is StoreItems {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * `Storage` kept in a single JSON file, for local runs of the bot.
 */
export class LocalFileStorage implements Storage {
  private readonly filePath: string;

  constructor(fileDir: string, fileName = ".welcome.localstore.json") {
    this.filePath = path.resolve(fileDir, fileName);
  }

  public async read(keys: string[]): Promise<StoreItems> {
    if (!(await this.storeFileExists())) {
      return {};
    }

    const data = await this.readFromFile();
    const result: StoreItems = {};
    for (const key of keys) {
      if (data[key] !== undefined) {
        result[key] = data[key];
      }
    }
    return result;
  }

  public async write(changes: StoreItems): Promise<void> {
    if (!(await this.storeFileExists())) {
      await this.writeToFile(changes);
    } else {
      const data = await this.readFromFile();
      await this.writeToFile(Object.assign(data, changes));
    }
  }

  public async delete(keys: string[]): Promise<void> {
    if (!(await this.storeFileExists())) {
      return;
    }

    const data = await this.readFromFile();
    for (const key of keys) {
      if (data[key] !== undefined) {
        delete data[key];
      }
    }
    await this.writeToFile(data);
  }

  private storeFileExists(): Promise<boolean> {
    return new Promise((resolve) => {
      fs.access(this.filePath, (err) => {
        resolve(!err);
      });
    });
  }

  private readFromFile(): Promise<StoreItems> {
    return new Promise((resolve, reject) => {
      fs.readFile(this.filePath, { encoding: "utf-8" }, (err, rawData) => {
        if (err) {
          reject(err);
          return;
        }
        try {
          const data: unknown = JSON.parse(rawData);
          if (!isStoreItems(data)) {
            reject(new Error(`${this.filePath} does not hold a JSON object.`));
          } else {
            resolve(data);
          }
        } catch (error: unknown) {
          reject(error);
        }
      });
    });
  }

  private writeToFile(data: StoreItems): Promise<void> {
    return new Promise((resolve, reject) => {
      const rawData = JSON.stringify(data, undefined, 2);
      fs.writeFile(this.filePath, rawData, { encoding: "utf-8" }, (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }
}
