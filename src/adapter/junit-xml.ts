import { XMLParser } from "fast-xml-parser";
import fs from "node:fs";
import type { GroupResult } from "../types/push.js";

function attr(node: unknown, name: string): string | undefined {
  if (node === null || typeof node !== "object") return undefined;
  const v: unknown = Reflect.get(node, `@_${name}`);
  return typeof v === "string" || typeof v === "number" ? String(v) : undefined;
}

function children(node: unknown, name: string): unknown[] {
  if (node === null || typeof node !== "object") return [];
  const v: unknown = Reflect.get(node, name);
  if (v === undefined) return [];
  return Array.isArray(v) ? v : [v];
}

/**
 * Parse a JUnit XML report into per-group results: each `<testsuite>` is one
 * test group, failing when any of its cases has a failure or an error.
 */
export function parseJunitGroups(xmlContent: string): GroupResult[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    isArray: (name) => name === "testsuite" || name === "testcase",
  });

  const parsed: unknown = parser.parse(xmlContent);

  // Handle both <testsuites> wrapper and bare <testsuite> elements
  const wrapper = children(parsed, "testsuites")[0];
  const suites = wrapper !== undefined ? children(wrapper, "testsuite") : children(parsed, "testsuite");

  const results: GroupResult[] = [];
  for (const suite of suites) {
    const group = attr(suite, "name");
    if (!group) continue;

    const declared = Number.parseInt(attr(suite, "failures") ?? "0", 10) + Number.parseInt(attr(suite, "errors") ?? "0", 10);
    const failingCases = children(suite, "testcase").filter(
      (tc) => children(tc, "failure").length > 0 || children(tc, "error").length > 0,
    ).length;

    results.push({
      group,
      ok: declared === 0 && failingCases === 0,
      duration_ms: Math.round(Number.parseFloat(attr(suite, "time") ?? "0") * 1000),
    });
  }
  return results;
}

export function parseJunitGroupsFile(filePath: string): GroupResult[] {
  return parseJunitGroups(fs.readFileSync(filePath, "utf8"));
}
