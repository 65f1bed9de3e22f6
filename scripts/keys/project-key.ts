export const MAX_PROJECT_KEY_LENGTH = 400;
const MAX_OWNER_PART = 150;
const MAX_NAME_PART = 240;
const MAX_IDENTITY_PART = 200;

const DEFAULT_OWNER = "unknown";
const DEFAULT_NAME = "unnamed";

export interface ProjectKeyParts {
  owner: string;
  name: string;
  key: string;
}

export interface KeyValidation {
  valid: boolean;
  errors: string[];
}

/** Loosely-typed identity fields as they come out of a CSV row or an old JSON file. */
export interface IdentityFields {
  owner?: unknown;
  name?: unknown;
  full_name?: unknown;
  fullName?: unknown;
}

function cleanPart(value: unknown, fallback: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    return fallback;
  }
  const cleaned = value
    .trim()
    .replace(/[/\\]/g, "-")
    .replace(/[^A-Za-z0-9\-_.]/g, "_")
    .replace(/[-_]{2,}/g, "_")
    .replace(/^[-_]+|[-_]+$/g, "");
  return cleaned === "" ? fallback : cleaned;
}

export function sanitizeKeyParts(owner: unknown, name: unknown): ProjectKeyParts {
  let cleanOwner = cleanPart(owner, DEFAULT_OWNER);
  let cleanName = cleanPart(name, DEFAULT_NAME);
  let key = `${cleanOwner}_${cleanName}`;

  if (key.length > MAX_PROJECT_KEY_LENGTH) {
    cleanOwner = cleanOwner.slice(0, MAX_OWNER_PART);
    cleanName = cleanName.slice(0, MAX_NAME_PART);
    key = `${cleanOwner}_${cleanName}`;
    console.warn(`⚠️  Project key too long, truncated to ${key.length} characters`);
  }

  return { owner: cleanOwner, name: cleanName, key };
}

/** Builds the scanner-safe project key `{owner}_{name}` for a repository. */
export function sanitizeProjectKey(owner: unknown, name: unknown): string {
  return sanitizeKeyParts(owner, name).key;
}

export function validateProjectKey(key: unknown): KeyValidation {
  if (typeof key !== "string" || key === "") {
    return { valid: false, errors: ["Project key is empty"] };
  }

  const errors: string[] = [];

  if (key.length > MAX_PROJECT_KEY_LENGTH) {
    errors.push(`Project key too long: ${key.length} characters (max ${MAX_PROJECT_KEY_LENGTH})`);
  }

  const invalid = key.match(/[^A-Za-z0-9\-_.:]/g);
  if (invalid) {
    errors.push(`Invalid characters: ${Array.from(new Set(invalid)).join(" ")}`);
  }

  if (key.includes("/") || key.includes("\\")) {
    errors.push("Project key contains a path separator");
  }

  if (!key.includes("_")) {
    errors.push("Expected owner_name format (missing '_' separator)");
  }

  return { valid: errors.length === 0, errors };
}

/** Cell text with surrounding blanks removed; a blank-only cell reads as empty. */
function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function hasSeparator(value: string): boolean {
  return value.includes("/") || value.includes("\\");
}

export function validateRepositoryIdentity(record: IdentityFields): KeyValidation {
  const errors: string[] = [];

  for (const field of ["owner", "name"] as const) {
    const value = record[field];
    if (value === undefined || value === null || value === "") {
      errors.push(`Missing required field: ${field}`);
      continue;
    }
    if (typeof value !== "string") {
      errors.push(`Field '${field}' must be a string`);
      continue;
    }
    if (value.trim() === "") {
      errors.push(`Missing required field: ${field}`);
      continue;
    }
    if (hasSeparator(value)) {
      errors.push(`Field '${field}' contains a path separator: ${value}`);
    }
    if (value.length > MAX_IDENTITY_PART) {
      errors.push(`Field '${field}' too long: ${value.length} characters`);
    }
  }

  return { valid: errors.length === 0, errors };
}

export function needsRepair(record: IdentityFields): boolean {
  const owner = readText(record.owner);
  const name = readText(record.name);
  return owner === "" || name === "" || hasSeparator(owner) || hasSeparator(name);
}

function splitOnFirstSeparator(value: string): [string, string] | null {
  const index = value.indexOf("/");
  if (index === -1) {
    return null;
  }
  const head = value.slice(0, index);
  const tail = value.slice(index + 1);
  if (head === "" || tail === "") {
    return null;
  }
  return [head, tail];
}

/**
 * Recovers owner/name for the two known corruption shapes:
 * an empty owner with an `owner/name` full name, or an empty owner with the
 * combined value stuffed into `name`. Anything else returns null.
 */
export function repairRecord<T extends IdentityFields>(record: T): T | null {
  if (readText(record.owner) !== "") {
    return null;
  }

  const fullName = readText(record.full_name) || readText(record.fullName);
  const fromFullName = splitOnFirstSeparator(fullName);
  if (fromFullName) {
    const [owner, name] = fromFullName;
    return { ...record, owner, name };
  }

  const fromName = splitOnFirstSeparator(readText(record.name));
  if (fromName) {
    const [owner, name] = fromName;
    return { ...record, owner, name };
  }

  return null;
}
