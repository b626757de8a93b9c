/**
 * Utility functions shared by the tooling modules
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, sep } from "path";

/**
 * Check if value is a plain object (not null, not array)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Normalize whitespace in a string
 */
export function normalize(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Forward slashes regardless of platform, for manifest entries
 */
export function toPosixPath(path: string): string {
  return path.split(sep).join("/");
}

/**
 * Write a file, creating its directory. Skips the write when the content is
 * already there; returns whether anything was written.
 */
export function writeFileIfChanged(path: string, content: string): boolean {
  if (existsSync(path) && readFileSync(path, "utf8") === content) {
    return false;
  }
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
  return true;
}
