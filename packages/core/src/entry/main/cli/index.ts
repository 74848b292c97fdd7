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
import { readFile, writeFile } from "node:fs/promises";
import { Console } from "node:console";
import { inspect } from "node:util";

import { opts } from "./options.js";
import { UnmovedError } from "../../../core/error.js";
import { HTTP } from "../../../core/formats/http-fmt.js";
import { repairResponse } from "../../../core/repair/repair.js";
import type { Notifier } from "../../../core/repair/notify.js";

// stdout may carry the response itself, so all diagnostics go to stderr.
const log = new Console({ stdout: process.stderr, stderr: process.stderr });

const notifier: Notifier = {
  annotate({ highlight, comment }) {
    log.info(`[${highlight}] ${comment}`);
  },
  alert(message) {
    log.warn(message);
  },
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof UnmovedError) {
      log.warn(error.formatted);
    } else {
      log.error("unexpected error: " + inspect(error, { depth: Infinity }));
    }
    process.exitCode = 1;
  });

async function main() {
  const {
    positionals: [file],
    values: { url, out, help },
  } = opts();

  if (help || !file) {
    log.info(
      `
usage
-----
  unmoved response.http --url https://origin/path [--out repaired.http]

reads a captured raw http response and writes it back, repaired when it is
a redirect carrying the (gzipped) content of its target.
`.trim(),
    );
    return help ? 0 : 1;
  }

  const raw = await readFile(file).catch((error: unknown) => {
    throw new UnmovedError(`could not read ${file}`, error);
  });

  const view = HTTP.response.parse(raw);
  const decision = repairResponse(view, {
    resolveUrl: () => url ?? file,
    notifier,
    logger: log,
  });

  const output =
    decision.kind === "unchanged" ? raw : HTTP.response.build(decision);

  if (decision.kind === "rewritten") {
    log.info(decision.notification.summary);
  }

  if (out) {
    await writeFile(out, output);
  } else {
    process.stdout.write(output);
  }

  return 0;
}
