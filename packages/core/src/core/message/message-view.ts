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

/**
 * A parsed, read-only view of an intercepted HTTP response.
 *
 * The status line is kept apart from the header lines, and each header line
 * is the raw `Name: value` text (no line terminator), in wire order.
 * Duplicate headers are kept as they arrived.
 */
export type HttpMessageView = {
  readonly statusLine: string;
  readonly headers: readonly string[];
  readonly body: Buffer;
};

export type Highlight = "cyan";

/**
 * Describes a rewrite for the operator: the history annotation
 * (highlight + comment) and the alert line.
 */
export type Notification = {
  url: string;
  summary: string;
  highlight: Highlight;
  comment: string;
  alert: string;
};

export type RewriteDecision =
  | { kind: "unchanged" }
  | {
      kind: "rewritten";
      statusLine: string;
      headers: string[];
      body: Buffer;
      notification: Notification;
    };

export const UNCHANGED: RewriteDecision = { kind: "unchanged" };

export function statusCodeOf(statusLine: string): string | undefined {
  const [, code] = statusLine.trim().split(/\s+/);

  return code;
}

export function headerName(line: string): string {
  const colon = line.indexOf(":");

  return (colon < 0 ? line : line.slice(0, colon)).trim().toLowerCase();
}

export function headerValue(line: string): string {
  const colon = line.indexOf(":");

  return colon < 0 ? "" : line.slice(colon + 1).trim();
}

export function applyDecision(
  view: HttpMessageView,
  decision: RewriteDecision,
): HttpMessageView {
  if (decision.kind === "unchanged") {
    return view;
  }

  const { statusLine, headers, body } = decision;

  return { statusLine, headers, body };
}
