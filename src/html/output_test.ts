import { test } from "node:test";
import { expect } from "expect";
import { BufferedOutput } from "./output.ts";

test("BufferedOutput joins fragments in emission order", () => {
  const out = new BufferedOutput();
  out.write("<p>");
  out.write("hi");
  out.writeLine("</p>");
  out.writeLine();

  expect(out.toString()).toBe("<p>hi</p>\n\n");
  expect(out.fragments).toEqual(["<p>", "hi", "</p>\n", "\n"]);
});

test("BufferedOutput reports UTF-8 byte length", () => {
  const out = new BufferedOutput();
  out.write("é");

  expect(out.toString().length).toBe(1);
  expect(out.byteLength).toBe(2);
});

test("BufferedOutput starts empty", () => {
  const out = new BufferedOutput();

  expect(out.toString()).toBe("");
  expect(out.byteLength).toBe(0);
});
