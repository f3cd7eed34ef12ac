import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { ConfigError } from "../errors";

export type NicknameTable = Record<string, string[]>;

/**
 * Validate a nickname file: a mapping of league → list of nicknames, with no
 * nickname listed twice (case-insensitively) for the same league.
 */
export function validateNicknameDocument(doc: unknown, source: string): NicknameTable {
  if (doc === undefined || doc === null) {
    return {};
  }
  if (typeof doc !== "object" || Array.isArray(doc)) {
    throw new ConfigError("Invalid structure: expected league keys with nickname lists", source);
  }

  const table: NicknameTable = {};
  for (const [league, entries] of Object.entries(doc)) {
    if (!Array.isArray(entries) || !entries.every((e): e is string => typeof e === "string" && e.trim() !== "")) {
      throw new ConfigError(`Nicknames for "${league}" must be a list of non-empty strings`, source);
    }

    const seen = new Set<string>();
    const dups: string[] = [];
    for (const nick of entries) {
      const key = nick.trim().toLowerCase();
      if (seen.has(key)) dups.push(nick);
      seen.add(key);
    }

    if (dups.length) {
      throw new ConfigError(`Duplicate nicknames for ${league} in ${path.basename(source)}: ${dups.join(", ")}`, source);
    }

    table[league.toLowerCase()] = entries.map(e => e.trim().replace(/\s+/g, " "));
  }

  return table;
}

export function validateNicknameFile(filePath: string): NicknameTable {
  const text = fs.readFileSync(filePath, "utf8");
  let doc: unknown;
  try {
    doc = yaml.load(text);
  } catch (error) {
    throw new ConfigError(`Invalid YAML: ${error instanceof Error ? error.message : String(error)}`, filePath);
  }
  return validateNicknameDocument(doc, filePath);
}
