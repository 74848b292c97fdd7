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
import type { IncomingMessage } from "node:http";
import {
  type HttpMessageView,
  headerName,
  headerValue,
  statusCodeOf,
} from "../../core/message/message-view.js";

export type IncomingResponseHead = Pick<
  IncomingMessage,
  "httpVersion" | "statusCode" | "statusMessage" | "rawHeaders"
>;

export function messageViewFromIncoming(
  { httpVersion, statusCode, statusMessage, rawHeaders }: IncomingResponseHead,
  body: Buffer,
): HttpMessageView {
  const headers: string[] = [];
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    headers.push(`${rawHeaders[i]}: ${rawHeaders[i + 1]}`);
  }

  return {
    statusLine: `HTTP/${httpVersion} ${statusCode ?? 0}${statusMessage ? ` ${statusMessage}` : ""}`,
    headers,
    body,
  };
}

// a rewritten body is sent whole, so its framing headers are recomputed.
const framingHeaders = new Set(["content-length", "transfer-encoding"]);

/**
 * Splits a view into what `writeHead` takes.  Unless `reframe` is set the
 * upstream framing headers pass through as they were (a HEAD response keeps
 * the Content-Length of the resource).
 */
export function responseHeadFromView(
  { statusLine, headers, body }: HttpMessageView,
  { reframe }: { reframe: boolean },
): {
  statusCode: number;
  statusMessage: string;
  headers: string[];
} {
  const code = statusCodeOf(statusLine) ?? "";

  const pairs = headers
    .filter(
      (line) =>
        line.includes(":") && !(reframe && framingHeaders.has(headerName(line))),
    )
    .flatMap((line) => [
      line.slice(0, line.indexOf(":")).trim(),
      headerValue(line),
    ]);

  return {
    statusCode: /^\d{3}$/.test(code) ? Number(code) : 502,
    statusMessage: statusLine.trimStart().replace(/^\S+\s+\S+\s?/, ""),
    headers: reframe ? [...pairs, "Content-Length", String(body.length)] : pairs,
  };
}
