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
import { headerName } from "../message/message-view.js";

export function rewriteStatusLine(statusLine: string): string {
  return statusLine.replace(/ \d{3}(?: .*)?$/, " 200 OK");
}

export function withoutContentEncoding(headers: readonly string[]): string[] {
  return headers.filter((header) => headerName(header) !== "content-encoding");
}
