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

const STUB_OPEN = Buffer.from(
  "<html><head><title>Object moved</title></head><body>",
  "latin1",
);
const STUB_CLOSE = Buffer.from("</body></html>", "latin1");

/**
 * Removes the first "Object moved" html stub from the body.
 *
 * Matching is done on bytes: whatever follows the stub is usually gzip data
 * and must come through untouched.  The stub ends at the first closing
 * sequence after the opening one.
 */
export function carveObjectMovedStub(body: Buffer): {
  body: Buffer;
  carved: boolean;
} {
  const start = body.indexOf(STUB_OPEN);
  if (start < 0) {
    return { body, carved: false };
  }

  const close = body.indexOf(STUB_CLOSE, start + STUB_OPEN.length);
  if (close < 0) {
    return { body, carved: false };
  }

  return {
    body: Buffer.concat([
      body.subarray(0, start),
      body.subarray(close + STUB_CLOSE.length),
    ]),
    carved: true,
  };
}
