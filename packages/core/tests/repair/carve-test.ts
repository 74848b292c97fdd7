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
import { describe, it } from "node:test";
import assert from "node:assert";
import { carveObjectMovedStub } from "../../src/core/repair/carve.js";
import { gzip, stub } from "../fixtures.js";

describe("carveObjectMovedStub", () => {
  it("removes the stub and keeps the binary payload intact", () => {
    const payload = gzip("var x=1;");
    const { body, carved } = carveObjectMovedStub(
      Buffer.concat([stub, payload]),
    );

    assert.equal(carved, true);
    assert.deepStrictEqual(body, payload);
  });

  it("keeps bytes on both sides of the stub", () => {
    const { body } = carveObjectMovedStub(
      Buffer.concat([Buffer.from("before|"), stub, Buffer.from("|after")]),
    );

    assert.equal(body.toString("latin1"), "before||after");
  });

  it("removes only the first stub", () => {
    const { body } = carveObjectMovedStub(
      Buffer.concat([stub, Buffer.from("-"), stub]),
    );

    assert.deepStrictEqual(body, Buffer.concat([Buffer.from("-"), stub]));
  });

  it("ends the stub at the first closing sequence", () => {
    const { body } = carveObjectMovedStub(
      Buffer.from(
        "<html><head><title>Object moved</title></head><body>a</body></html>b</body></html>",
      ),
    );

    assert.equal(body.toString("latin1"), "b</body></html>");
  });

  it("leaves a body without a complete stub unchanged", () => {
    const open = Buffer.from(
      "<html><head><title>Object moved</title></head><body>never closed",
    );

    const result = carveObjectMovedStub(open);
    assert.equal(result.carved, false);
    assert.strictEqual(result.body, open);

    const other = Buffer.from("<html><head><title>Moved</title></head></html>");
    assert.equal(carveObjectMovedStub(other).carved, false);
  });

  it("is idempotent once the stub is gone", () => {
    const once = carveObjectMovedStub(
      Buffer.concat([stub, Buffer.from("payload")]),
    ).body;
    const twice = carveObjectMovedStub(once).body;

    assert.deepStrictEqual(twice, once);
  });
});
