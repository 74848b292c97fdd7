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
import {
  type HttpMessageView,
  type RewriteDecision,
  UNCHANGED,
} from "../message/message-view.js";
import { isRepairCandidate } from "./classify.js";
import { carveObjectMovedStub } from "./carve.js";
import { decompressPayload } from "./decompress.js";
import { rewriteStatusLine, withoutContentEncoding } from "./rewrite.js";
import {
  type Logger,
  type Notifier,
  describeRepair,
  emitNotification,
} from "./notify.js";

export type RepairOptions = {
  /** resolves the url of the request this response answers (only called on rewrite). */
  resolveUrl: () => string;
  notifier?: Notifier;
  logger?: Logger;
};

/**
 * Repairs a redirect that carries the (gzipped) content of its target.
 *
 * Either the whole repair applies or none of it does: if the payload cannot
 * be inflated the original message is kept, even though the stub was
 * already carved out of the working copy.
 */
export function repairResponse(
  view: HttpMessageView,
  { resolveUrl, notifier, logger = console }: RepairOptions,
): RewriteDecision {
  if (!isRepairCandidate(view)) {
    return UNCHANGED;
  }

  const { body: carvedBody, carved } = carveObjectMovedStub(view.body);
  if (carved) {
    logger.info("removed 'Object moved' redirect html from body.");
  }

  const decompression = decompressPayload(carvedBody, view.headers);

  switch (decompression.kind) {
    case "failed":
      logger.warn(
        "GZIP decompression failed:",
        decompression.error.formatted,
      );
      return UNCHANGED;
    case "succeeded":
      logger.info(
        `found gzip data at offset ${decompression.offset}, decompressed ${decompression.body.length} bytes.`,
      );
      break;
  }

  const statusLine = rewriteStatusLine(view.statusLine);
  logger.info(`status changed: ${view.statusLine.trim()} -> 200 OK`);

  const notification = describeRepair({
    url: resolveUrl(),
    carved,
    decompression,
  });

  if (notifier) {
    emitNotification(notification, notifier, logger);
  }

  return {
    kind: "rewritten",
    statusLine,
    headers:
      decompression.kind === "succeeded"
        ? withoutContentEncoding(view.headers)
        : [...view.headers],
    body: decompression.kind === "succeeded" ? decompression.body : carvedBody,
    notification,
  };
}
