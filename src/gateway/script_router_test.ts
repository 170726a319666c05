import { test } from "node:test";
import { expect } from "expect";
import { ScriptRouter } from "./script_router.ts";
import { createScriptRegistry } from "../scripts/registry.ts";

function createRouter(prefix?: string) {
  return new ScriptRouter({
    registry: createScriptRegistry(),
    serverSoftware: "test-gateway/0.1",
    prefix,
  });
}

test("resolveName takes the first segment after the prefix", () => {
  const router = createRouter();

  expect(router.resolveName("/scripts/env_dump")).toBe("env_dump");
  expect(router.resolveName("/scripts/env_dump/a/b")).toBe("env_dump");
});

test("resolveName returns empty string outside the prefix", () => {
  const router = createRouter();

  expect(router.resolveName("/scripts")).toBe("");
  expect(router.resolveName("/scripts/")).toBe("");
  expect(router.resolveName("/other/env_dump")).toBe("");
});

test("resolveName honours a custom prefix", () => {
  const router = createRouter("/cgi-bin");

  expect(router.resolveName("/cgi-bin/large_output")).toBe("large_output");
  expect(router.resolveName("/scripts/large_output")).toBe("");
});
