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
import { after, before, describe, it, mock } from "node:test";
import assert from "node:assert";
import { once } from "node:events";
import {
  type IncomingHttpHeaders,
  type Server,
  createServer,
  request,
} from "node:http";
import { startProxyServer } from "../../src/entry/proxy/server.js";
import { ProxyHistory } from "../../src/entry/proxy/history.js";
import { gzip, padding, stub } from "../fixtures.js";

function portOf(server: Server) {
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("server is not listening on a port");
  }

  return address.port;
}

function get(
  port: number,
  path: string,
): Promise<{ status?: number; headers: IncomingHttpHeaders; body: Buffer }> {
  return new Promise((resolve, reject) => {
    request({ host: "127.0.0.1", port, path, agent: false }, (res) => {
      const chunks: Buffer[] = [];
      res.on("data", (chunk: Buffer) => chunks.push(chunk));
      res.on("error", reject);
      res.on("end", () =>
        resolve({
          status: res.statusCode,
          headers: res.headers,
          body: Buffer.concat(chunks),
        }),
      );
    })
      .on("error", reject)
      .end();
  });
}

describe("startProxyServer", () => {
  const history = new ProxyHistory(10);
  const movedBody = Buffer.concat([stub, padding(), gzip("var x=1;")]);

  const upstream = createServer((req, res) => {
    switch (req.url) {
      case "/app/main.js":
        res.writeHead(302, "Found", {
          Location: "/app/main.js?v=2",
          "Content-Type": "application/x-javascript",
          "Content-Encoding": "gzip",
          "Content-Length": String(movedBody.length),
        });
        res.end(movedBody);
        return;
      case "/app/plain.js":
        res.writeHead(200, { "Content-Type": "application/x-javascript" });
        res.end("var y=2;");
        return;
      case "/app/broken.js":
        res.writeHead(302, "Found", {
          "Content-Type": "application/x-javascript",
          "Content-Length": "5000",
        });
        res.write(padding(100), () => res.destroy());
        return;
      default:
        res.writeHead(404);
        res.end();
    }
  });

  let proxy: Server;
  let target: string;

  before(async () => {
    upstream.listen({ port: 0, host: "127.0.0.1" });
    await once(upstream, "listening");
    target = `http://127.0.0.1:${portOf(upstream)}`;

    proxy = startProxyServer({ port: 0, target, history });
    await once(proxy, "listening");
  });

  after(async () => {
    for (const server of [proxy, upstream]) {
      server.closeAllConnections();
      server.close();
      await once(server, "close");
    }
  });

  it("serves a repaired redirect", async () => {
    const { status, headers, body } = await get(portOf(proxy), "/app/main.js");

    assert.equal(status, 200);
    assert.equal(body.toString("utf-8"), "var x=1;");
    assert.equal(headers["content-length"], "8");
    assert.equal(headers["content-encoding"], undefined);
    assert.equal(headers["location"], "/app/main.js?v=2");

    const [entry] = history.entries.filter(
      ({ url }) => url === `${target}/app/main.js`,
    );
    assert.equal(entry?.highlight, "cyan");
    assert.equal(
      entry?.comment,
      `Redirect modified and decompressed for URL: ${target}/app/main.js`,
    );
  });

  it("passes other responses through", async () => {
    const { status, body } = await get(portOf(proxy), "/app/plain.js");

    assert.equal(status, 200);
    assert.equal(body.toString("utf-8"), "var y=2;");
  });

  it("answers 502 when the upstream drops mid-body", async () => {
    const errors = mock.method(console, "error", () => {});

    try {
      const { status } = await get(portOf(proxy), "/app/broken.js");

      assert.equal(status, 502);
      assert.ok(
        errors.mock.calls.some(({ arguments: [message] }) =>
          String(message).startsWith("proxy failure: GET "),
        ),
      );
    } finally {
      errors.mock.restore();
    }
  });
});
