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

export {
  type HttpMessageView,
  type Notification,
  type RewriteDecision,
  type Highlight,
  applyDecision,
  statusCodeOf,
} from "../core/message/message-view.js";

export { repairResponse, type RepairOptions } from "../core/repair/repair.js";
export {
  isRepairCandidate,
  CANDIDATE_MIN_BODY_BYTES,
} from "../core/repair/classify.js";
export { carveObjectMovedStub } from "../core/repair/carve.js";
export {
  decompressPayload,
  isJavascriptContentType,
  GZIP_MAGIC,
  type DecompressionOutcome,
} from "../core/repair/decompress.js";
export {
  rewriteStatusLine,
  withoutContentEncoding,
} from "../core/repair/rewrite.js";
export {
  describeRepair,
  emitNotification,
  type Annotation,
  type Logger,
  type Notifier,
} from "../core/repair/notify.js";

export { HTTP } from "../core/formats/http-fmt.js";
export { UnmovedError } from "../core/error.js";

export {
  loadWorkspace,
  normalizeWorkspace,
  type Workspace,
} from "../runtime/init/workspace.js";

export { ProxyHistory, type HistoryEntry } from "../entry/proxy/history.js";
export { startProxyServer, route } from "../entry/proxy/server.js";
