import fs from "node:fs";
import path from "node:path";
import { isRecord } from "./utils";

export interface PackageMeta {
  name?: string;
  version?: string;
  description?: string;
}

const PACKAGE_JSON_CANDIDATES = [
  path.resolve(__dirname, "../../package.json"),
  path.resolve(__dirname, "../package.json")
];

export function parsePackageMeta(raw: string): PackageMeta {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    return {};
  }
  const pick = (key: string) => (typeof parsed[key] === "string" ? String(parsed[key]) : undefined);
  return { name: pick("name"), version: pick("version"), description: pick("description") };
}

export function readPackageMeta(candidates: string[] = PACKAGE_JSON_CANDIDATES): PackageMeta {
  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) {
      continue;
    }

    try {
      return parsePackageMeta(fs.readFileSync(candidate, "utf8"));
    } catch {
      continue;
    }
  }

  return {};
}
