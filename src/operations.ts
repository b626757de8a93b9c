/**
 * Operation catalog: corpus operation id to Noir primitive, numeric variant,
 * cast signature and return category.
 *
 * Loaded once from data/operations.json, validated, then frozen.
 */

import { z } from "zod";
import catalog from "./data/operations.json";
import { OperationSpec } from "./types";

const NumericVariantSchema = z.enum(["integer", "float", "double"]);

const OperationSpecSchema = z
  .object({
    id: z.string().regex(/^(fn|op|xs):[A-Za-z-]+$/),
    sourceFile: z.string().endsWith(".xml"),
    primitive: z.string().regex(/^[a-z][a-z0-9_]*$/),
    variant: NumericVariantSchema.nullable(),
    cast: z.object({ from: NumericVariantSchema, to: NumericVariantSchema }).optional(),
    returns: z.enum([
      "boolean",
      "integer",
      "unsignedInteger",
      "float",
      "double",
      "optionalInteger",
      "datetime",
      "duration",
    ]),
  })
  .refine((spec) => spec.cast === undefined || spec.variant === null, {
    message: "cast operations carry no numeric variant",
  });

const CatalogSchema = z.object({ operations: z.array(OperationSpecSchema) });

export function buildCatalog(input: unknown): ReadonlyMap<string, OperationSpec> {
  const { operations } = CatalogSchema.parse(input);
  const map = new Map<string, OperationSpec>();
  for (const spec of operations) {
    if (map.has(spec.id)) {
      throw new Error(`Duplicate operation id ${spec.id}`);
    }
    const frozen: OperationSpec = Object.freeze({
      ...spec,
      cast: spec.cast ? Object.freeze({ ...spec.cast }) : undefined,
    });
    map.set(spec.id, frozen);
  }
  return map;
}

const OPERATIONS = buildCatalog(catalog);

export function getOperation(id: string): OperationSpec | undefined {
  return OPERATIONS.get(id);
}

/**
 * Every operation id, sorted
 */
export function listOperations(): string[] {
  return [...OPERATIONS.keys()].sort();
}

export function allOperations(): OperationSpec[] {
  return [...OPERATIONS.values()];
}
