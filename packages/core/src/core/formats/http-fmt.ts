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
import { UnmovedError } from "../error.js";
import {
  type HttpMessageView,
  headerName,
} from "../message/message-view.js";

const CRLF = "\r\n";

export const HTTP = {
  response: {
    parse: parseResponseMessage,
    build: buildResponseMessage,
    stringify: stringifyResponseMessage,
  },
};

function findHeaderEnd(raw: Buffer): { end: number; bodyStart: number } {
  const crlf = raw.indexOf("\r\n\r\n", 0, "latin1");
  const lf = raw.indexOf("\n\n", 0, "latin1");

  if (crlf >= 0 && (lf < 0 || crlf < lf)) {
    return { end: crlf, bodyStart: crlf + 4 };
  }

  if (lf >= 0) {
    return { end: lf, bodyStart: lf + 2 };
  }

  return { end: raw.length, bodyStart: raw.length };
}

/**
 * Splits a raw HTTP/1.x response into status line, header lines and body.
 *
 * The header block is decoded as latin1 so every byte maps to one character;
 * the body is kept as the original bytes.
 */
function parseResponseMessage(raw: Buffer): HttpMessageView {
  const { end, bodyStart } = findHeaderEnd(raw);
  const [statusLine, ...headers] = raw
    .subarray(0, end)
    .toString("latin1")
    .split(/\r?\n/);

  if (!statusLine?.trim()) {
    throw new UnmovedError("invalid http response: missing status line");
  }

  return {
    statusLine,
    headers: headers.filter((line) => line.length > 0),
    body: Buffer.from(raw.subarray(bodyStart)),
  };
}

function buildResponseMessage({
  statusLine,
  headers,
  body,
}: HttpMessageView): Buffer {
  const lines = headers.map((line) =>
    line.includes(":") && headerName(line) === "content-length"
      ? `${line.slice(0, line.indexOf(":"))}: ${body.length}`
      : line,
  );

  return Buffer.concat([
    Buffer.from(
      [statusLine, ...lines].map((line) => `${line}${CRLF}`).join("") + CRLF,
      "latin1",
    ),
    body,
  ]);
}

function stringifyResponseMessage({
  statusLine,
  headers,
  body,
}: HttpMessageView) {
  return `${statusLine}${headers
    .map((header) => `\n${header}`)
    .join("")}\n\n[${body.length} bytes]`;
}
