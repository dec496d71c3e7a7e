import { z } from "zod";

import { GraphOptionsError } from "./errors.js";

/** Directionality of a graph: symmetric graphs mirror every edge mutation. */
export const GRAPH_MODES = ["directed", "symmetric"] as const;

export type GraphMode = (typeof GRAPH_MODES)[number];

/** Schema accepting the weights an edge or a path step may carry. */
export const EdgeWeightSchema = z
  .number()
  .int("weight must be an integer")
  .nonnegative("weight must not be negative")
  .max(Number.MAX_SAFE_INTEGER, "weight must be a safe integer");

export const GraphModeSchema = z.enum(GRAPH_MODES);

/** Returns `true` when {@link weight} can be stored on an edge. */
export function isValidWeight(weight: number): boolean {
  return EdgeWeightSchema.safeParse(weight).success;
}

/**
 * Parses an untrusted mode literal. Issues are flattened into a
 * {@link GraphOptionsError} so callers get one typed failure.
 */
export function parseGraphMode(input: unknown): GraphMode {
  const parsed = GraphModeSchema.safeParse(input);
  if (!parsed.success) {
    throw new GraphOptionsError(parsed.error.issues.map((issue) => issue.message));
  }
  return parsed.data;
}
