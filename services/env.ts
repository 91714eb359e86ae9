/**
 * Environment file (.env) reader.
 *
 * dotenv loads the working directory's .env at startup. This module reads any
 * other .env file (the `--env <path>` flag of run.ts) into a record that is
 * layered under process.env:
 * - Parse raw .env content into key-value records
 * - Read a .env file from disk with a configurable path
 * - Merge file values under an existing environment
 */

import { readFile } from "fs/promises";
import { join } from "path";

// ============================================================================
// TYPES
// ============================================================================

/** Key-value record representing parsed .env contents */
export type EnvRecord = Record<string, string>;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Read and parse a .env file from disk.
 *
 * @param envPath - Absolute path to the .env file. Defaults to process.cwd()/.env
 * @returns Parsed key-value pairs from the .env file
 * @throws Error if the file cannot be read
 */
export async function readEnv(envPath?: string): Promise<EnvRecord> {
  const filePath = envPath ?? join(process.cwd(), ".env");
  try {
    return parseEnvFile(await readFile(filePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot read env file ${filePath}: ${message}`);
  }
}

/**
 * Layer file values under an environment. Keys already set in the
 * environment win, the same precedence dotenv uses.
 *
 * @param fileValues - Values parsed from a .env file
 * @param env - The live environment
 * @returns A merged record
 */
export function mergeEnv(
  fileValues: EnvRecord,
  env: Record<string, string | undefined>
): Record<string, string | undefined> {
  const merged: Record<string, string | undefined> = { ...fileValues };
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) merged[key] = value;
  }
  return merged;
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Parse a .env file string into a key-value record.
 * Handles lines in the format KEY=VALUE, ignores empty lines and comments.
 * Keeps empty values (KEY= produces { KEY: "" }). Strips one pair of
 * matching surrounding quotes.
 *
 * @param content - Raw .env file content
 * @returns Parsed key-value pairs
 */
export function parseEnvFile(content: string): EnvRecord {
  const result: EnvRecord = {};
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIndex = trimmed.indexOf("=");
    if (eqIndex === -1) continue;
    const key = trimmed.slice(0, eqIndex).trim();
    result[key] = unquote(trimmed.slice(eqIndex + 1).trim());
  }
  return result;
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value.endsWith(first)) {
      return value.slice(1, -1);
    }
  }
  return value;
}
