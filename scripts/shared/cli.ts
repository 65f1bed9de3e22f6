import { InvalidArgumentError } from "commander";
import { pathToFileURL } from "node:url";

/** True when the module at `metaUrl` is the script node was started with. */
export function isDirectInvocation(metaUrl: string): boolean {
  try {
    return pathToFileURL(process.argv[1] ?? "").href === metaUrl;
  } catch {
    return false;
  }
}

export function parseCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

export function parsePositive(value: string): number {
  const parsed = parseCount(value);
  if (parsed === 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}
