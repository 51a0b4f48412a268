// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import * as fs from "fs";
import * as ACData from "adaptivecards-templating";
import registerDebug from "debug";
import { z } from "zod";
import { ConfigurationLoadError } from "./errors";

const debug = registerDebug("welcome-bot:orderCards");

const orderReferenceSchema = z.object({
  frId: z.string().min(1),
});

const cardElementSchema = z
  .object({
    type: z.string(),
  })
  .passthrough();

export const adaptiveCardSchema = z
  .object({
    type: z.literal("AdaptiveCard"),
    body: z.array(cardElementSchema).min(1),
  })
  .passthrough();

export type AdaptiveCardPayload = z.infer<typeof adaptiveCardSchema>;

export interface OrderDocumentPaths {
  /**
   * JSON document holding the `frId` that a message must match.
   */
  referencePath: string;

  /**
   * Adaptive card template sent back on a match.
   */
  templatePath: string;
}

export interface OrderLookup {
  referenceId: string;
  template: AdaptiveCardPayload;
}

export type OrderLookupResult =
  | { ok: true; lookup: OrderLookup }
  | { ok: false; error: ConfigurationLoadError };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

async function readJsonDocument<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S
): Promise<z.infer<S>> {
  let rawData: string;
  try {
    rawData = await fs.promises.readFile(filePath, { encoding: "utf-8" });
  } catch (error: unknown) {
    throw new ConfigurationLoadError(`Unable to read ${filePath}.`, filePath, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawData);
  } catch (error: unknown) {
    throw new ConfigurationLoadError(`${filePath} is not valid JSON.`, filePath, { cause: error });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationLoadError(
      `${filePath} is malformed: ${formatIssues(result.error)}`,
      filePath,
      { cause: result.error }
    );
  }
  return result.data;
}

export async function loadOrderLookup(paths: OrderDocumentPaths): Promise<OrderLookup> {
  const [reference, template] = await Promise.all([
    readJsonDocument(paths.referencePath, orderReferenceSchema),
    readJsonDocument(paths.templatePath, adaptiveCardSchema),
  ]);
  return {
    referenceId: reference.frId,
    template,
  };
}

/**
 * Expand the order card template and put `displayId` into the first body element.
 *
 * @remarks
 * The template held by `lookup` is left untouched.
 */
export function buildOrderCard(lookup: OrderLookup, displayId: string): AdaptiveCardPayload {
  const expanded: unknown = new ACData.Template(lookup.template).expand({
    $root: {
      frId: lookup.referenceId,
      orderId: displayId,
    },
  });

  const result = adaptiveCardSchema.safeParse(expanded);
  if (!result.success) {
    throw new ConfigurationLoadError(
      `Order card template did not expand to an adaptive card: ${formatIssues(result.error)}`,
      "order card template",
      { cause: result.error }
    );
  }

  const [first, ...rest] = result.data.body;
  debug(`Order card built for ${lookup.referenceId}`);
  return {
    ...result.data,
    body: [{ ...first, text: displayId }, ...rest],
  };
}

/**
 * Holds the order documents for the lifetime of the process.
 *
 * @remarks
 * Call {@link OrderCardSource.load} once at startup. Turns only read the cached
 * result through {@link OrderCardSource.current}, so no message ever touches the disk.
 */
export class OrderCardSource {
  private readonly paths: OrderDocumentPaths;
  private result: OrderLookupResult;

  constructor(paths: OrderDocumentPaths) {
    this.paths = paths;
    this.result = {
      ok: false,
      error: new ConfigurationLoadError(
        "Order documents have not been loaded yet.",
        paths.referencePath
      ),
    };
  }

  public async load(): Promise<OrderLookup> {
    try {
      const lookup = await loadOrderLookup(this.paths);
      this.result = { ok: true, lookup };
      debug(`Loaded order reference from ${this.paths.referencePath}`);
      return lookup;
    } catch (error: unknown) {
      const loadError =
        error instanceof ConfigurationLoadError
          ? error
          : new ConfigurationLoadError("Unable to load order documents.", this.paths.referencePath, {
              cause: error,
            });
      this.result = { ok: false, error: loadError };
      throw loadError;
    }
  }

  public current(): OrderLookupResult {
    return this.result;
  }
}
