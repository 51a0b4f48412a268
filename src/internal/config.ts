// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import * as path from "path";
import { z } from "zod";
import { ConfigurationLoadError } from "../welcome/errors";

export const DEFAULT_ORDER_DISPLAY_ID = "US|5722106988174";
export const DEFAULT_STATE_STORE_FILENAME = ".welcome.localstore.json";

export interface AppConfig {
  port: number;
  orderReferencePath: string;
  orderCardTemplatePath: string;
  orderDisplayId: string;
  stateStore: "memory" | "file";
  /**
   * Directory of the local state file, used when `stateStore` is "file".
   */
  stateStoreDir: string;
  stateStoreFileName: string;
}

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3978),
  WELCOME_RESOURCE_DIR: z.string().min(1).default("./resources"),
  ORDER_REFERENCE_PATH: z.string().min(1).optional(),
  ORDER_CARD_TEMPLATE_PATH: z.string().min(1).optional(),
  ORDER_DISPLAY_ID: z.string().min(1).default(DEFAULT_ORDER_DISPLAY_ID),
  STATE_STORE: z.enum(["memory", "file"]).default("memory"),
  RUNNING_ON_AZURE: z.string().optional(),
  TEMP: z.string().optional(),
  WELCOME_STATE_STORE_FILENAME: z.string().min(1).default(DEFAULT_STATE_STORE_FILENAME),
});

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const invalid = result.error.issues.map((issue) => issue.path.join("."));
    throw new ConfigurationLoadError(
      `Invalid environment variables: ${invalid.join(", ")}`,
      invalid.join(", "),
      { cause: result.error }
    );
  }

  const vars = result.data;
  const resourceDir = path.resolve(vars.WELCOME_RESOURCE_DIR);
  return {
    port: vars.PORT,
    orderReferencePath: path.resolve(
      vars.ORDER_REFERENCE_PATH ?? path.join(resourceDir, "order-reference.json")
    ),
    orderCardTemplatePath: path.resolve(
      vars.ORDER_CARD_TEMPLATE_PATH ?? path.join(resourceDir, "adaptiveCards", "order-detail.json")
    ),
    orderDisplayId: vars.ORDER_DISPLAY_ID,
    stateStore: vars.STATE_STORE,
    stateStoreDir: path.resolve(vars.RUNNING_ON_AZURE === "1" ? vars.TEMP ?? "./" : "./"),
    stateStoreFileName: vars.WELCOME_STATE_STORE_FILENAME,
  };
}
