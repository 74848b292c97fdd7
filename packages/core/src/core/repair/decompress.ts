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
import { gunzipSync } from "node:zlib";
import { UnmovedError } from "../error.js";

export const GZIP_MAGIC = Buffer.from([0x1f, 0x8b]);

export type DecompressionOutcome =
  | { kind: "skipped"; reason: "content-type" | "no-signature" }
  | { kind: "succeeded"; body: Buffer; offset: number }
  | { kind: "failed"; offset: number; error: UnmovedError };

export function isJavascriptContentType(headers: readonly string[]) {
  return headers.some((header) => {
    const line = header.toLowerCase();

    return (
      line.startsWith("content-type:") &&
      line.includes("application/x-javascript")
    );
  });
}

/**
 * Inflates the gzip payload hidden in a (carved) javascript body.
 *
 * Only the first magic number is considered the start of the payload,
 * anything before it is dropped.  A broken stream is reported as a
 * failure rather than thrown.
 */
export function decompressPayload(
  body: Buffer,
  headers: readonly string[],
): DecompressionOutcome {
  if (!isJavascriptContentType(headers)) {
    return { kind: "skipped", reason: "content-type" };
  }

  const offset = body.indexOf(GZIP_MAGIC);
  if (offset < 0) {
    return { kind: "skipped", reason: "no-signature" };
  }

  try {
    return {
      kind: "succeeded",
      body: gunzipSync(body.subarray(offset)),
      offset,
    };
  } catch (error) {
    return {
      kind: "failed",
      offset,
      error: new UnmovedError(
        `could not inflate gzip payload at offset ${offset}`,
        error,
      ),
    };
  }
}
