// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

/**
 * A static document or an environment setting the bot depends on is missing,
 * unreadable or malformed.
 */
export class ConfigurationLoadError extends Error {
  /**
   * The file path or setting name that failed to load.
   */
  public readonly source: string;

  constructor(message: string, source: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationLoadError";
    this.source = source;
  }
}

/**
 * The user state store could not be read or written, or the turn carries no
 * user identity to key the state by.
 */
export class StateAccessError extends Error {
  /**
   * The storage key involved, when one could be derived.
   */
  public readonly key?: string;

  constructor(message: string, key?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StateAccessError";
    this.key = key;
  }
}
