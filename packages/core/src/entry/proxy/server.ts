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
import HttpProxy from "http-proxy";
import {
  type IncomingMessage,
  type Server,
  ServerResponse,
  createServer,
} from "node:http";
import { UnmovedError } from "../../core/error.js";
import { HTTP } from "../../core/formats/http-fmt.js";
import { applyDecision } from "../../core/message/message-view.js";
import { repairResponse } from "../../core/repair/repair.js";
import type { ProxyHistory } from "./history.js";
import { messageViewFromIncoming, responseHeadFromView } from "./incoming.js";

const { createProxyServer } = HttpProxy;

export type ProxyConfig = {
  port: number;
  target?: string;
  history: ProxyHistory;
};

/**
 * Absolute request urls (a client using us as its http proxy) go to their
 * own origin, anything else goes to the configured target.
 */
export function route(
  req: Pick<IncomingMessage, "url">,
  target?: string,
): string | null {
  const requested = req.url ?? "";

  if (/^https?:[/][/]/i.test(requested) && URL.canParse(requested)) {
    return new URL(requested).href;
  }

  if (target && requested.startsWith("/")) {
    return new URL(requested, target).href;
  }

  return null;
}

function answerFailure(res: ServerResponse) {
  if (res.writableEnded) {
    return;
  }

  if (res.headersSent) {
    res.destroy();
    return;
  }

  res.writeHead(502);
  res.end();
}

export function startProxyServer({
  port,
  target,
  history,
}: ProxyConfig): Server {
  const proxy = createProxyServer();
  const routed = new WeakMap<IncomingMessage, string>();

  proxy.on("proxyRes", (proxyRes, req, res) => {
    const url = routed.get(req) ?? req.url ?? "";
    const chunks: Buffer[] = [];
    let settled = false;

    const fail = (error: unknown) => {
      if (settled) {
        return;
      }
      settled = true;

      console.error(`proxy failure: ${req.method ?? "GET"} ${url}`, error);
      answerFailure(res);
    };

    proxyRes.on("data", (chunk: Buffer) => chunks.push(chunk));
    proxyRes.on("error", fail);
    proxyRes.on("close", () => {
      if (!proxyRes.complete) {
        fail(new UnmovedError("upstream closed before the response completed"));
      }
    });
    proxyRes.on("end", () => {
      if (settled) {
        return;
      }
      settled = true;

      const view = messageViewFromIncoming(proxyRes, Buffer.concat(chunks));
      const entry = history.record(url, view.statusLine);

      const decision = repairResponse(view, {
        resolveUrl: () => url,
        notifier: history.notifierFor(entry),
      });
      const served = applyDecision(view, decision);

      const { statusCode, statusMessage, headers } = responseHeadFromView(
        served,
        { reframe: decision.kind === "rewritten" },
      );

      console.info(`<<< ${url}\n${HTTP.response.stringify(served)}`);

      res.writeHead(statusCode, statusMessage || undefined, headers);
      res.end(served.body);
    });
  });

  proxy.on("error", (error, req, res) => {
    console.error(`proxy failure: ${req.method ?? "GET"} ${req.url}`, error);

    if (res instanceof ServerResponse) {
      answerFailure(res);
    } else {
      res.destroy();
    }
  });

  console.info("# starting server on port", port);

  return createServer((req, res) => {
    const url = route(req, target);

    if (!url) {
      res.writeHead(404);
      res.end();
      return;
    }

    routed.set(req, url);

    proxy.web(req, res, {
      target: url,
      ignorePath: true,
      changeOrigin: true,
      selfHandleResponse: true,
    });
  }).listen({ port }, () => {
    console.info(`started repairing proxy server on port ${port}`);
  });
}
