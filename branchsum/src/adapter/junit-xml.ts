import { XMLParser, XMLValidator } from "fast-xml-parser";
import fs from "node:fs";
import { InvalidRecordError } from "../summary/errors.js";
import type { RawTestResult } from "../types/test-result.js";

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function children(node: XmlNode, name: string): unknown[] {
  const value = node[name];
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function attr(node: XmlNode, name: string): string | undefined {
  const value = node[`@_${name}`];
  return typeof value === "string" ? value : undefined;
}

/** Top-level suites of a document, with or without the `<testsuites>` wrapper. */
function suitesOf(parsed: XmlNode): XmlNode[] {
  const wrapper = parsed.testsuites;
  const source = isNode(wrapper) ? wrapper : parsed;
  return children(source, "testsuite").filter(isNode);
}

function statusOf(testcase: XmlNode): RawTestResult["status"] {
  if ("failure" in testcase || "error" in testcase) return "fail";
  if ("skipped" in testcase) return "skip";
  return "pass";
}

function collect(suite: XmlNode, branch: string, records: RawTestResult[]): void {
  for (const tc of children(suite, "testcase")) {
    // `<testcase/>` without attributes parses to an empty string
    const testcase = isNode(tc) ? tc : {};
    const name = attr(testcase, "name") ?? "unknown";
    const className = attr(testcase, "classname");
    const time = attr(testcase, "time");

    records.push({
      branch,
      test: className ? `${className}.${name}` : name,
      status: statusOf(testcase),
      duration: time === undefined ? 0 : Number(time),
    });
  }
  for (const nested of children(suite, "testsuite").filter(isNode)) {
    collect(nested, branch, records);
  }
}

/**
 * Parse JUnit XML into one record per `<testcase>`, nested suites included.
 * The test name is `classname.name` when a classname is given; `time` is kept
 * in seconds, and a non-numeric time becomes NaN for the builder to reject.
 *
 * Throws InvalidRecordError for malformed XML and for a document whose root
 * is neither `<testsuites>` nor `<testsuite>`.
 */
export function parseJunitXml(xmlContent: string, branch: string, source = "<input>"): RawTestResult[] {
  const valid = XMLValidator.validate(xmlContent);
  if (valid !== true) {
    throw new InvalidRecordError(`Invalid JUnit XML in ${source}: ${valid.err.msg} (line ${valid.err.line})`, {
      source,
    });
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    isArray: (name) => name === "testsuite" || name === "testcase",
  });
  const parsed: unknown = parser.parse(xmlContent);
  if (!isNode(parsed) || !("testsuites" in parsed || "testsuite" in parsed)) {
    throw new InvalidRecordError(`Invalid JUnit XML in ${source}: expected a <testsuites> or <testsuite> root`, {
      source,
    });
  }

  const records: RawTestResult[] = [];
  for (const suite of suitesOf(parsed)) collect(suite, branch, records);
  return records;
}

export function parseJunitXmlFile(filePath: string, branch: string): RawTestResult[] {
  const content = fs.readFileSync(filePath, "utf8");
  return parseJunitXml(content, branch, filePath);
}
