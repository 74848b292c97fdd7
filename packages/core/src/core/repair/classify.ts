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
  statusCodeOf,
} from "../message/message-view.js";

/** Bodies at or below this size are treated as ordinary redirect notices. */
export const CANDIDATE_MIN_BODY_BYTES = 1000;

/**
 * A response is worth repairing when it has a 3xx status line and a body
 * too large to be just the "moved" notice.  Header lines are not required.
 */
export function isRepairCandidate({
  statusLine,
  body,
}: HttpMessageView): boolean {
  const code = statusCodeOf(statusLine);

  return (
    code !== undefined &&
    /^3\d\d$/.test(code) &&
    body.length > CANDIDATE_MIN_BODY_BYTES
  );
}
