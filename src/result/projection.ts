/**
 * Typed return projection.
 *
 * Decoding always yields generic property bags. A {@link ReturnShape} reshapes
 * them afterwards by parsing each bag with the caller's zod schemas; nothing
 * here touches the network.
 */

import { z } from "zod";

import { TypeMismatchError } from "../errors";
import type {
  CrossReference,
  GroupByObject,
  GroupByReturn,
  Group,
  Properties,
  QueryNested,
  QueryReturn,
  ReferencedObject,
  References,
  ResultObject,
  ReturnProperty,
} from "../types";
import { getOwn, setOwn } from "./records";

export type ReferenceShapes = Record<string, z.ZodTypeAny>;

/** Caller-declared shape of the properties, and of each expanded reference. */
export interface ReturnShape<P, R extends ReferenceShapes = {}> {
  properties: z.ZodType<P, z.ZodTypeDef, unknown>;
  /** References without a declared shape are left out of projected objects. */
  references?: R;
}

export type ProjectedReferences<R extends ReferenceShapes> = {
  [K in keyof R]?: CrossReference<z.output<R[K]>>;
};

export function returnShape<P, R extends ReferenceShapes = {}>(
  properties: z.ZodType<P, z.ZodTypeDef, unknown>,
  references?: R
): ReturnShape<P, R> {
  return references ? { properties, references } : { properties };
}

// =============================================================================
// Parsing
// =============================================================================

function parseBag<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, bag: Properties, prefix: string): T {
  const parsed = schema.safeParse(bag);
  if (parsed.success) {
    return parsed.data;
  }
  const issue = parsed.error.issues[0];
  const field = [prefix, ...issue.path.map(String)].filter(Boolean).join(".");
  throw new TypeMismatchError(`Property '${field}' does not match the return type: ${issue.message}`, field, {
    cause: parsed.error,
  });
}

function projectReference<S extends z.ZodTypeAny>(
  reference: CrossReference,
  schema: S,
  linkOn: string
): CrossReference<z.output<S>> {
  const objects = reference.objects.map(
    (object): ReferencedObject<z.output<S>> =>
      Object.freeze({ ...object, properties: parseBag(schema, object.properties, linkOn) })
  );
  return Object.freeze({ objects: Object.freeze(objects) });
}

function projectReferences<R extends ReferenceShapes>(
  references: References,
  shapes: R | undefined
): ProjectedReferences<R> {
  const out: ProjectedReferences<R> = {};
  if (!shapes) return out;
  for (const linkOn in shapes) {
    const reference = getOwn(references, linkOn);
    if (reference) {
      out[linkOn] = projectReference(reference, shapes[linkOn], linkOn);
    }
  }
  Object.freeze(out);
  return out;
}

// =============================================================================
// Results
// =============================================================================

export function projectObject<P, R extends ReferenceShapes>(
  object: ResultObject,
  shape: ReturnShape<P, R>
): ResultObject<P, ProjectedReferences<R>> {
  return Object.freeze({
    ...object,
    properties: parseBag(shape.properties, object.properties, ""),
    references: projectReferences(object.references, shape.references),
  });
}

function projectGroupObject<P, R extends ReferenceShapes>(
  object: GroupByObject,
  shape: ReturnShape<P, R>
): GroupByObject<P, ProjectedReferences<R>> {
  return Object.freeze({ ...projectObject(object, shape), belongsToGroup: object.belongsToGroup });
}

export function projectQueryReturn<P, R extends ReferenceShapes>(
  result: QueryReturn,
  shape: ReturnShape<P, R>
): QueryReturn<P, ProjectedReferences<R>> {
  return Object.freeze({
    ...result,
    objects: Object.freeze(result.objects.map((object) => projectObject(object, shape))),
  });
}

export function projectGroupByReturn<P, R extends ReferenceShapes>(
  result: GroupByReturn,
  shape: ReturnShape<P, R>
): GroupByReturn<P, ProjectedReferences<R>> {
  const groups: Record<string, Group<P, ProjectedReferences<R>>> = {};
  const objects: GroupByObject<P, ProjectedReferences<R>>[] = [];
  for (const group of Object.values(result.groups)) {
    const members = group.objects.map((object) => projectGroupObject(object, shape));
    setOwn(groups, group.name, Object.freeze({ ...group, objects: Object.freeze(members) }));
    objects.push(...members);
  }
  return Object.freeze({ ...result, objects: Object.freeze(objects), groups: Object.freeze(groups) });
}

// =============================================================================
// Requested properties from a shape
// =============================================================================

function unwrap(schema: z.ZodTypeAny): z.ZodTypeAny {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) return unwrap(schema.unwrap());
  if (schema instanceof z.ZodDefault) return unwrap(schema.removeDefault());
  if (schema instanceof z.ZodEffects) return unwrap(schema.innerType());
  if (schema instanceof z.ZodArray) return unwrap(schema.element);
  return schema;
}

function shapeProperties(shape: z.ZodRawShape): ReturnProperty[] {
  return Object.entries(shape).map(([name, field]): ReturnProperty => {
    const inner = unwrap(field);
    if (inner instanceof z.ZodObject) {
      const nested: QueryNested = { name, properties: shapeProperties(inner.shape) };
      return nested;
    }
    return name;
  });
}

/**
 * Property selection implied by a zod object schema: its keys, with object and
 * object-array members narrowed to their own keys. `undefined` for any other
 * schema, which leaves the selection to the server.
 */
export function propertiesFromSchema(schema: z.ZodTypeAny): ReturnProperty[] | undefined {
  const inner = unwrap(schema);
  return inner instanceof z.ZodObject ? shapeProperties(inner.shape) : undefined;
}
