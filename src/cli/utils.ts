import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { VERSION } from "../shared/constants.js";

const PACKAGE_NAME = "toolbridge";

// src/cli sits two levels below the root, dist/src/cli three.
const CANDIDATES = ["../../package.json", "../../../package.json"];

function readPackageJson(path: string): { name?: unknown; version?: unknown } | undefined {
  if (!existsSync(path)) return undefined;
  try {
    return JSON.parse(readFileSync(path, "utf8")) as { name?: unknown; version?: unknown };
  } catch {
    return undefined;
  }
}

/** Path of this project's package.json as seen from `moduleUrl`, if one is found. */
export function findPackageJson(moduleUrl: string = import.meta.url): string | undefined {
  for (const rel of CANDIDATES) {
    const path = fileURLToPath(new URL(rel, moduleUrl));
    if (readPackageJson(path)?.name === PACKAGE_NAME) return path;
  }
  return undefined;
}

export function getPackageJsonVersion(moduleUrl: string = import.meta.url): string {
  const path = findPackageJson(moduleUrl);
  const version = path ? readPackageJson(path)?.version : undefined;
  return typeof version === "string" ? version : VERSION;
}
