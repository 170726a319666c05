import { test } from "node:test";
import { expect } from "expect";
import { escapeHtml } from "./escape.ts";

test("escapeHtml replaces markup characters with entities", () => {
  expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
    "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#039;s&lt;/a&gt;"
  );
});

test("escapeHtml leaves plain text untouched", () => {
  expect(escapeHtml("/usr/local/bin:/usr/bin")).toBe("/usr/local/bin:/usr/bin");
});

test("escapeHtml escapes existing entities exactly once", () => {
  expect(escapeHtml("&lt;")).toBe("&amp;lt;");
});

test("escapeHtml handles empty string", () => {
  expect(escapeHtml("")).toBe("");
});
