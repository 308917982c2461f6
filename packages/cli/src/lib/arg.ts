/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import type { ParameterSet } from "@modelrepo/sdk";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  return Number.parseInt(trimmed, 10);
}

/**
 * Parse a strictly positive integer argument
 */
export function parsePositiveInt(value: string, name: string): number {
  const parsed = parseNonNegativeInt(value, name);
  if (parsed === 0) {
    throw new InvalidArgumentError(`${name} must be greater than 0`);
  }
  return parsed;
}

/**
 * Parse a comma-separated list of non-negative integers (e.g. GPU ids "0,2")
 */
export function parseIdList(value: string, name: string): number[] {
  const parts = value.split(",").map((part) => part.trim());
  if (parts.some((part) => part === "")) {
    throw new InvalidArgumentError(`${name} must be a comma-separated list of integers`);
  }
  return parts.map((part) => parseNonNegativeInt(part, name));
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Parse a JSON object of outgoing parameters
 */
export function parseParameterSet(value: string, source: string): ParameterSet {
  const parsed = parseJson(value, source);
  if (!isParameterSet(parsed)) {
    throw new InvalidArgumentError(`${source} must be a JSON object`);
  }
  return parsed;
}

function isParameterSet(value: unknown): value is ParameterSet {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
