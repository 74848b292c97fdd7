/*
Copyright 2025 Adobe. All rights reserved.
This file is licensed to you under the Apache License, Version 2.0 (the "License");
you may not use this file except in compliance with the License. You may obtain a copy
of the License at http://www.apache.org/licenses/LICENSE-2.0

Unless required by applicable law or agreed to in writing, software distributed under
the License is distributed on an "AS IS" BASIS, WITHOUT WARRANTIES OR REPRESENTATIONS
OF ANY KIND, either express or implied. See the License for the specific language
governing permissions and limitations under the License.
*/
import type { Highlight, Notification } from "../message/message-view.js";
import type { DecompressionOutcome } from "./decompress.js";

export type Logger = Pick<Console, "info" | "warn">;

export type Annotation = {
  highlight: Highlight;
  comment: string;
};

/**
 * Receives the side effects of a rewrite: the history annotation and the
 * operator alert.  Either may be async; nothing waits for them.
 */
export type Notifier = {
  annotate(annotation: Annotation): void | Promise<void>;
  alert(message: string): void | Promise<void>;
};

export function describeRepair({
  url,
  carved,
  decompression,
}: {
  url: string;
  carved: boolean;
  decompression: DecompressionOutcome;
}): Notification {
  const steps = ["status rewritten to 200 OK"];

  if (carved) {
    steps.push("object moved stub removed");
  }

  if (decompression.kind === "succeeded") {
    steps.push(`${decompression.body.length} bytes inflated`);
  }

  return {
    url,
    summary: steps.join(", "),
    highlight: "cyan",
    comment: `Redirect modified and decompressed for URL: ${url}`,
    alert: `Modified response for URL: ${url}`,
  };
}

export function emitNotification(
  { highlight, comment, alert }: Notification,
  notifier: Notifier,
  logger: Logger = console,
) {
  deliver("annotate", () => notifier.annotate({ highlight, comment }), logger);
  deliver("alert", () => notifier.alert(alert), logger);
}

function deliver(
  what: string,
  effect: () => void | Promise<void>,
  logger: Logger,
) {
  const warn = (error: unknown) =>
    logger.warn(`warning: failed to ${what} repaired response:`, error);

  try {
    const pending = effect();
    if (pending instanceof Promise) {
      pending.catch(warn);
    }
  } catch (error) {
    warn(error);
  }
}
