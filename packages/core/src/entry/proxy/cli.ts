#!/usr/bin/env -S node --enable-source-maps --stack-trace-limit=69

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
import { parseArgs } from "node:util";
import {
  loadWorkspace,
  parsePort,
  parseTarget,
} from "../../runtime/init/workspace.js";
import { UnmovedError } from "../../core/error.js";
import { ProxyHistory } from "./history.js";
import { startProxyServer } from "./server.js";

server().catch((error: unknown) => {
  console.error(error instanceof UnmovedError ? error.formatted : error);
  process.exitCode = 1;
});

export async function server() {
  const {
    values: { port, target, cwd },
  } = parseArgs({
    options: {
      port: {
        type: "string",
        short: "p",
      },
      target: {
        type: "string",
        short: "t",
      },
      cwd: {
        type: "string",
      },
    },
  });

  const workspace = await loadWorkspace({ cwd });

  startProxyServer({
    port: port === undefined ? workspace.port : parsePort(port),
    target: target === undefined ? workspace.target : parseTarget(target),
    history: new ProxyHistory(workspace.history),
  });

  return 0;
}
