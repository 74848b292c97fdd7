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
import { dirname, join } from "node:path";
import { readFile, stat } from "node:fs/promises";
import os from "node:os";

import * as YAML from "yaml";

import { UnmovedError } from "../../core/error.js";

export type Workspace = {
  port: number;
  target?: string;
  history: number;
};

export const defaultWorkspace: Workspace = {
  port: 7000,
  history: 200,
};

function* configurationFiles(cwd: string): Iterable<string> {
  let parentdir = cwd;

  do {
    cwd = parentdir;
    yield join(cwd, "unmovedrc.yaml");
    yield join(cwd, "package.json");
    yield join(cwd, ".unmoved", "unmovedrc.yaml");
    parentdir = dirname(cwd);
  } while (parentdir.length < cwd.length);

  yield join(os.homedir(), ".unmoved", "unmovedrc.yaml");
  yield join(os.homedir(), ".config", "unmoved", "unmovedrc.yaml");
}

async function isFile(path: string) {
  return await stat(path)
    .then((stat) => stat.isFile())
    .catch(() => false);
}

async function loadWorkspaceSource(path: string): Promise<unknown> {
  if (path.endsWith("unmovedrc.yaml") && (await isFile(path))) {
    return YAML.parse(await readFile(path, "utf-8")) ?? {};
  }

  if (path.endsWith("package.json") && (await isFile(path))) {
    const pkg: unknown = JSON.parse(await readFile(path, "utf-8"));

    return isRecord(pkg) ? pkg["unmoved"] : undefined;
  }

  return;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function normalizeWorkspace(source: unknown): Workspace {
  if (!isRecord(source)) {
    throw new UnmovedError("unmoved configuration must be a mapping");
  }

  const { port, target, history } = source;

  return {
    port: port === undefined ? defaultWorkspace.port : parsePort(port),
    target: target === undefined ? undefined : parseTarget(target),
    history:
      history === undefined ? defaultWorkspace.history : parseHistory(history),
  };
}

export function parsePort(port: unknown): number {
  const value = typeof port === "string" ? Number(port) : port;

  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value < 0 ||
    value > 65535
  ) {
    throw new UnmovedError(`invalid port: ${String(port)}`);
  }

  return value;
}

export function parseTarget(target: unknown): string {
  if (typeof target !== "string" || !URL.canParse(target)) {
    throw new UnmovedError(`invalid target origin: ${String(target)}`);
  }

  return new URL(target).origin;
}

function parseHistory(history: unknown): number {
  if (typeof history !== "number" || !Number.isInteger(history) || history < 1) {
    throw new UnmovedError(`invalid history size: ${String(history)}`);
  }

  return history;
}

export async function discoverWorkspace(
  cwd: string,
): Promise<{ root: string; workspace: Workspace } | undefined> {
  for (const configfile of configurationFiles(cwd)) {
    const root = dirname(configfile);

    try {
      const rc = await loadWorkspaceSource(configfile);
      if (rc !== undefined) {
        return { root, workspace: normalizeWorkspace(rc) };
      }
    } catch (error) {
      console.warn(`warning: error loading ${configfile} as unmovedrc:`, error);
      // ignore and continue
    }
  }
}

export async function loadWorkspace({
  cwd = process.cwd(),
}: { cwd?: string } = {}): Promise<Workspace> {
  return (await discoverWorkspace(cwd))?.workspace ?? defaultWorkspace;
}
