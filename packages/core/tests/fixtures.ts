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
import { gzipSync } from "node:zlib";
import type { HttpMessageView } from "../src/core/message/message-view.js";
import type { Logger } from "../src/core/repair/notify.js";

export const stub = Buffer.from(
  `<html><head><title>Object moved</title></head><body>
<h2>Object moved to <a href="/app/main.js">here</a>.</h2>
</body></html>`,
  "latin1",
);

export function padding(length = 1200) {
  return Buffer.alloc(length, " ");
}

export function gzip(text: string) {
  return gzipSync(Buffer.from(text, "utf-8"));
}

export function view(
  statusLine: string,
  headers: string[],
  ...body: Buffer[]
): HttpMessageView {
  return { statusLine, headers, body: Buffer.concat(body) };
}

export function recordingLogger() {
  const infos: string[] = [];
  const warnings: string[] = [];

  const logger: Logger = {
    info(...args: unknown[]) {
      infos.push(args.map(String).join(" "));
    },
    warn(...args: unknown[]) {
      warnings.push(args.map(String).join(" "));
    },
  };

  return { logger, infos, warnings };
}
