import { describe, expect, it } from "vitest";

import { matchVersionTag, resolveNodeVersion } from "../src/libs/helpers/node-version.ts";
import { ToolError } from "../src/utils/base-tool.ts";
import { FakeNode } from "./helpers/fake-node.ts";

describe("matchVersionTag", () => {
  it("prefers the tag of the client major and spec version", () => {
    expect(matchVersionTag("3", 108, ["v3.107.0", "v3.108.0", "v4.108.0"])).toEqual({
      tag: "v3.108.0",
      fallback: false,
    });
  });

  it("falls back on any tag of the spec version", () => {
    expect(matchVersionTag("4", 108, ["v3.107.0", "v3.108.0"])).toEqual({
      tag: "v3.108.0",
      fallback: true,
    });
  });

  it("picks the greatest tag when several share the spec version", () => {
    expect(matchVersionTag("5", 108, ["v3.108.0", "v4.108.0", "v3.109.0"])).toEqual({
      tag: "v4.108.0",
      fallback: true,
    });
  });

  it("compares whole segments", () => {
    expect(matchVersionTag("3", 108, ["v3.1080.0", "v3.10.8"])).toBeUndefined();
  });

  it("finds nothing without tags", () => {
    expect(matchVersionTag("3", 108, [])).toBeUndefined();
  });
});

describe("resolveNodeVersion", () => {
  const noRetry = { retries: 0, timeoutMs: 0 };

  it("builds the version from the node client and runtime", async () => {
    const node = new FakeNode({}, { version: "3.0.1-8fe2c5a", specVersion: 108 });
    const version = await resolveNodeVersion(
      node.client(),
      node.blockHash,
      async () => ["v3.107.0", "v3.108.0"],
      noRetry,
    );
    expect(version).toEqual({ tag: "v3.108.0", clientMajor: "3", specVersion: 108, fallback: false });
    expect(node.callsOf("state_getRuntimeVersion")).toEqual([
      { method: "state_getRuntimeVersion", params: [node.blockHash] },
    ]);
  });

  it("reports a fallback match", async () => {
    const node = new FakeNode({}, { version: "4.0.0-8fe2c5a", specVersion: 108 });
    const version = await resolveNodeVersion(
      node.client(),
      node.blockHash,
      async () => ["v3.108.0"],
      noRetry,
    );
    expect(version.tag).toBe("v3.108.0");
    expect(version.fallback).toBe(true);
  });

  it("fails when no tag matches", async () => {
    const node = new FakeNode({}, { version: "3.0.0-8fe2c5a", specVersion: 108 });
    const resolution = resolveNodeVersion(
      node.client(),
      node.blockHash,
      async () => ["v3.107.0"],
      noRetry,
    );
    await expect(resolution).rejects.toThrow(ToolError);
    await expect(resolution).rejects.toThrow(
      "No tag found for v3.108.0 nor any tag of spec version 108",
    );
  });
});
