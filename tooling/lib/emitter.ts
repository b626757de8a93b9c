/**
 * Noir package emission and workspace manifest reconciliation
 */

import { existsSync, readFileSync, readdirSync, rmSync, writeFileSync } from "fs";
import { join, relative } from "path";
import { renderSkipComment, renderTestFunction, sanitizeTestName } from "../../src/assertions";
import { GeneratedTest, OperationSpec, SkipRecord } from "../../src/types";
import { Logger, globalLogger } from "./logger";
import { EmitResult, PackageLayout } from "./types";
import { toPosixPath, writeFileIfChanged } from "./utils";

export const PACKAGE_PREFIX = "xpath_test_";
export const CORPUS_URL = "https://github.com/w3c/qt3tests";

const DATETIME_HELPER = "datetime_from_epoch_microseconds_with_tz";
const DURATION_HELPER = "duration_from_microseconds";

export type EmitterOptions = {
  outputDir: string;
  chunkSize: number;
  libraryName: string;
  libraryPath: string;
  /** Directory holding the workspace Nargo.toml; the parent of `outputDir` by default */
  workspaceDir?: string;
};

export function workspaceDirFor(options: EmitterOptions): string {
  return options.workspaceDir ?? join(options.outputDir, "..");
}

export function packageName(operationId: string): string {
  return `${PACKAGE_PREFIX}${sanitizeTestName(operationId)}`;
}

export function packageLayout(operationId: string, outputDir: string, workspaceDir: string): PackageLayout {
  const name = packageName(operationId);
  const directory = join(outputDir, name);
  return {
    packageName: name,
    memberPath: toPosixPath(relative(workspaceDir, directory)),
    directory,
  };
}

export function chunk<T>(items: T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Suffix repeated identifiers with `_2`, `_3`, ... so a package never
 * defines the same test function twice
 */
export function dedupeIdentifiers(tests: GeneratedTest[]): GeneratedTest[] {
  const taken = new Set<string>();
  return tests.map((test) => {
    let identifier = test.identifier;
    for (let n = 2; taken.has(identifier); n += 1) {
      identifier = `${test.identifier}_${n}`;
    }
    taken.add(identifier);
    return identifier === test.identifier ? test : { ...test, identifier };
  });
}

function mentions(tests: GeneratedTest[], name: string): boolean {
  return tests.some((test) => test.setup.some((line) => line.includes(name)));
}

/**
 * The `use dep::<library>::{...};` block shared by every chunk
 */
export function importBlock(operation: OperationSpec, tests: GeneratedTest[], libraryName: string): string[] {
  const id = operation.id.toLowerCase();
  const primitive = operation.primitive.toLowerCase();
  const lines = [`use dep::${libraryName}::{`, `    ${operation.primitive},`];

  if (id.includes("datetime") || mentions(tests, DATETIME_HELPER)) {
    lines.push(`    ${DATETIME_HELPER},`);
  }
  if (id.includes("duration") || mentions(tests, DURATION_HELPER)) {
    lines.push(`    ${DURATION_HELPER},`);
  }
  if (id.includes("float") || primitive.includes("float") || mentions(tests, "XsdFloat::")) {
    lines.push("    XsdFloat,");
  }
  if (id.includes("double") || primitive.includes("double") || mentions(tests, "XsdDouble::")) {
    lines.push("    XsdDouble,");
  }

  lines.push("};");
  return lines;
}

export function renderPackageManifest(name: string, libraryName: string, libraryPath: string): string {
  return [
    "[package]",
    `name = "${name}"`,
    'type = "lib"',
    'authors = ["auto-generated"]',
    "",
    "[dependencies]",
    `${libraryName} = { path = "${libraryPath}" }`,
    "",
  ].join("\n");
}

export function renderLibFile(operationId: string, chunkCount: number): string {
  const lines = [`//! Auto-generated tests for ${operationId}`, `//! Source: ${CORPUS_URL}`, ""];
  for (let i = 0; i < chunkCount; i += 1) {
    lines.push(`mod chunk_${i};`);
  }
  return lines.join("\n");
}

export function renderChunkFile(operationId: string, index: number, tests: GeneratedTest[], imports: string[]): string {
  const lines = [`//! Test chunk ${index} for ${operationId}`, `//! Contains ${tests.length} tests`, "", ...imports, ""];
  for (const test of tests) {
    lines.push(renderTestFunction(test), "");
  }
  return lines.join("\n");
}

export function renderSkippedFile(operationId: string, skips: SkipRecord[]): string {
  const header = [`// Skipped tests for ${operationId}`, `// ${skips.length} tests could not be translated`];
  return [header.join("\n"), ...skips.map(renderSkipComment)].join("\n\n") + "\n";
}

function removeStaleChunks(srcDir: string, chunkCount: number): void {
  if (!existsSync(srcDir)) return;
  for (const entry of readdirSync(srcDir)) {
    const match = /^chunk_(\d+)\.nr$/.exec(entry);
    if (match && Number(match[1]) >= chunkCount) {
      rmSync(join(srcDir, entry));
    }
  }
}

/**
 * Write (or remove) the package for one operation. With no translated
 * tests the package directory is deleted.
 */
export function emitPackage(
  operation: OperationSpec,
  tests: GeneratedTest[],
  skips: SkipRecord[],
  options: EmitterOptions,
  logger: Logger = globalLogger
): EmitResult {
  const layout = packageLayout(operation.id, options.outputDir, workspaceDirFor(options));

  if (tests.length === 0) {
    logger.info(`No tests converted for ${operation.id} (skipped ${skips.length})`);
    if (existsSync(layout.directory)) {
      rmSync(layout.directory, { recursive: true, force: true });
      logger.debug("Removed stale package", { directory: layout.directory });
    }
    return { layout, written: false, testCount: 0, skipCount: skips.length, chunkCount: 0, files: [] };
  }

  const unique = dedupeIdentifiers(tests);
  const chunks = chunk(unique, options.chunkSize);
  const imports = importBlock(operation, unique, options.libraryName);
  const srcDir = join(layout.directory, "src");

  const files: Array<[string, string]> = [
    [
      join(layout.directory, "Nargo.toml"),
      renderPackageManifest(layout.packageName, options.libraryName, options.libraryPath),
    ],
    [join(srcDir, "lib.nr"), renderLibFile(operation.id, chunks.length)],
    ...chunks.map((group, i): [string, string] => [
      join(srcDir, `chunk_${i}.nr`),
      renderChunkFile(operation.id, i, group, imports),
    ]),
  ];

  const skippedPath = join(layout.directory, "skipped.txt");
  if (skips.length > 0) {
    files.push([skippedPath, renderSkippedFile(operation.id, skips)]);
  } else if (existsSync(skippedPath)) {
    rmSync(skippedPath);
  }

  removeStaleChunks(srcDir, chunks.length);
  for (const [path, content] of files) {
    writeFileIfChanged(path, content);
  }

  logger.info(`Generated: ${layout.packageName} (${unique.length} tests, ${skips.length} skipped)`);
  return {
    layout,
    written: true,
    testCount: unique.length,
    skipCount: skips.length,
    chunkCount: chunks.length,
    files: files.map(([path]) => path),
  };
}

const MEMBERS_PATTERN = /members\s*=\s*\[([\s\S]*?)\]/;
const WORKSPACE_HEADER = /^\[workspace\][ \t]*$/m;

export function renderMembers(members: string[]): string {
  if (members.length === 0) {
    return "members = []";
  }
  return ["members = [", ...members.map((member) => `    "${member}",`), "]"].join("\n");
}

export function parseMembers(manifest: string): string[] | undefined {
  const match = MEMBERS_PATTERN.exec(manifest);
  if (!match) return undefined;
  return Array.from(match[1].matchAll(/"([^"]+)"/g), (m) => m[1]);
}

/**
 * Replace the members array of a workspace manifest, keeping the rest of
 * the file as it is
 */
export function replaceMembers(manifest: string, members: string[]): string {
  const rendered = renderMembers(members);
  if (MEMBERS_PATTERN.test(manifest)) {
    return manifest.replace(MEMBERS_PATTERN, () => rendered);
  }
  const header = WORKSPACE_HEADER.exec(manifest);
  if (header) {
    const end = header.index + header[0].length;
    return `${manifest.slice(0, end)}\n${rendered}${manifest.slice(end)}`;
  }
  return `[workspace]\n${rendered}\n\n${manifest}`;
}

export type WorkspaceUpdate = {
  updated: boolean;
  members: string[];
  added: string[];
  removed: string[];
};

/**
 * Generated package directories (those holding a Nargo.toml), as workspace
 * member paths
 */
export function listGeneratedMembers(outputDir: string, workspaceDir: string): string[] {
  if (!existsSync(outputDir)) return [];
  const prefix = toPosixPath(relative(workspaceDir, outputDir));
  return readdirSync(outputDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && existsSync(join(outputDir, entry.name, "Nargo.toml")))
    .map((entry) => `${prefix}/${entry.name}`)
    .sort();
}

/**
 * Sync the members of `<workspaceDir>/Nargo.toml` with the packages under
 * `outputDir`. Hand-added members outside `outputDir` keep their order and
 * come first. The manifest is only written when its content changes.
 */
export function updateWorkspaceManifest(
  workspaceDir: string,
  outputDir: string,
  logger: Logger = globalLogger
): WorkspaceUpdate | undefined {
  const manifestPath = join(workspaceDir, "Nargo.toml");
  if (!existsSync(manifestPath) || !existsSync(outputDir)) {
    logger.debug("No workspace manifest to update", { manifestPath });
    return undefined;
  }

  const prefix = `${toPosixPath(relative(workspaceDir, outputDir))}/`;
  const existingContent = readFileSync(manifestPath, "utf8");
  const existing = parseMembers(existingContent) ?? [];
  const generated = listGeneratedMembers(outputDir, workspaceDir);

  const preserved = existing.filter((member) => !member.startsWith(prefix));
  const previous = new Set(existing.filter((member) => member.startsWith(prefix)));
  const current = new Set(generated);
  const members = [...preserved, ...generated];

  const added = generated.filter((member) => !previous.has(member));
  const removed = [...previous].filter((member) => !current.has(member));

  const content = replaceMembers(existingContent, members);
  const updated = content !== existingContent;
  if (updated) {
    writeFileSync(manifestPath, content);
    logger.info(`Updated workspace Nargo.toml: ${generated.length} test packages`, {
      added: added.length,
      removed: removed.length,
    });
  } else {
    logger.info(`Workspace Nargo.toml is already up to date (${generated.length} test packages)`);
  }

  return { updated, members, added, removed };
}
