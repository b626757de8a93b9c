/**
 * QT3 corpus reader
 *
 * Reads one test-set file into TestCase records. Cases without an inline
 * expression or without a result element are left out.
 */

import { XMLParser } from "fast-xml-parser";
import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { ResultKind, TestCase } from "../../src/types";
import { Logger, globalLogger } from "./logger";
import { errorMessage, isPlainObject, normalize } from "./utils";

const ATTRIBUTE_PREFIX = "@_";
const TEXT_NODE = "#text";
const REPEATED_ELEMENTS = new Set(["test-case", "dependency"]);

export function createCorpusParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    isArray: (name, _jpath, _isLeafNode, isAttribute) => !isAttribute && REPEATED_ELEMENTS.has(name),
  });
}

function asList(value: unknown): unknown[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function textOf(node: unknown): string {
  if (typeof node === "string") return node;
  if (typeof node === "number" || typeof node === "boolean") return String(node);
  if (isPlainObject(node)) return textOf(node[TEXT_NODE]);
  return "";
}

function attributeOf(node: unknown, name: string): string {
  if (!isPlainObject(node)) return "";
  const value = node[ATTRIBUTE_PREFIX + name];
  return typeof value === "string" ? value : "";
}

function childElementNames(node: Record<string, unknown>): string[] {
  return Object.keys(node).filter((key) => !key.startsWith(ATTRIBUTE_PREFIX) && key !== TEXT_NODE);
}

/**
 * `type:value` for every dependency element at any depth under `node`, in
 * document order
 */
function collectDependencies(node: unknown, into: string[] = []): string[] {
  if (!isPlainObject(node)) return into;
  for (const key of childElementNames(node)) {
    for (const child of asList(node[key])) {
      if (key === "dependency") {
        into.push(`${attributeOf(child, "type")}:${attributeOf(child, "value")}`);
      } else {
        collectDependencies(child, into);
      }
    }
  }
  return into;
}

function directDependencies(node: Record<string, unknown>): string[] {
  return asList(node.dependency).map((dep) => `${attributeOf(dep, "type")}:${attributeOf(dep, "value")}`);
}

/**
 * Classify the first assertion under `<result>`
 */
export function classifyResult(result: Record<string, unknown>): { kind: ResultKind; expected: string } {
  const [first] = childElementNames(result);
  const child = first === undefined ? undefined : asList(result[first])[0];

  switch (first) {
    case "assert-eq":
    case "assert-string-value":
      return { kind: "equals", expected: textOf(child).trim() };
    case "assert-true":
      return { kind: "true", expected: "true" };
    case "assert-false":
      return { kind: "false", expected: "false" };
    case "error":
      return { kind: "error", expected: attributeOf(child, "code") };
    default:
      return { kind: "unsupported", expected: first ?? "" };
  }
}

function readTestCase(node: unknown, inherited: string[]): TestCase | undefined {
  if (!isPlainObject(node)) return undefined;

  const expression = textOf(node.test).trim();
  if (expression === "") return undefined;
  if (!isPlainObject(node.result)) return undefined;

  const { kind, expected } = classifyResult(node.result);

  return {
    name: attributeOf(node, "name") || "unknown",
    description: normalize(textOf(asList(node.description)[0])),
    expression,
    expectedResult: expected,
    resultKind: kind,
    dependencies: [...inherited, ...collectDependencies(node)],
  };
}

/**
 * Parse a test-set document. Throws on malformed XML.
 */
export function parseTestSet(xml: string, parser: XMLParser = createCorpusParser()): TestCase[] {
  const document: unknown = parser.parse(xml, true);
  if (!isPlainObject(document) || !isPlainObject(document["test-set"])) {
    return [];
  }

  const testSet = document["test-set"];
  const inherited = directDependencies(testSet);
  const cases: TestCase[] = [];
  for (const node of asList(testSet["test-case"])) {
    const testCase = readTestCase(node, inherited);
    if (testCase) {
      cases.push(testCase);
    }
  }
  return cases;
}

export function testFilePath(corpusDir: string, sourceFile: string): string {
  return join(corpusDir, ...sourceFile.split("/"));
}

/**
 * Read one corpus file. A missing or unreadable file yields no tests and a
 * warning.
 */
export function readTestFile(path: string, logger: Logger = globalLogger): TestCase[] {
  if (!existsSync(path)) {
    logger.warn(`Test file not found: ${path}`);
    return [];
  }

  try {
    const cases = parseTestSet(readFileSync(path, "utf8"));
    logger.debug("Read test set", { path, testCases: cases.length });
    return cases;
  } catch (error) {
    logger.warn(`Could not parse ${path}`, { error: errorMessage(error) });
    return [];
  }
}
