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

export class UnmovedError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "UnmovedError";
  }

  get formatted() {
    const reasons: string[] = [this.message];

    let error: unknown = this.cause;
    while (error !== undefined) {
      reasons.push(error instanceof Error ? error.message : String(error));
      error = error instanceof Error ? error.cause : undefined;
    }

    return reasons.join("\n -- ");
  }
}
