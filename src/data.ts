// Alias tables, vocabularies and the glossary ship as JSON under data/.

import { readFileSync } from "node:fs";

export function readDataFile(name: string): unknown {
  const url = new URL(`../data/${name}`, import.meta.url);
  return JSON.parse(readFileSync(url, "utf-8"));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}
