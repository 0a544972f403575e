import * as Effect from "effect/Effect";
import * as ParseResult from "effect/ParseResult";
import * as Schema from "effect/Schema";
import { InvalidDocument } from "./Errors.ts";
import type { ResourceDecl, Value } from "./Resource.ts";

/**
 * The desired state: every resource that should exist after a run.
 */
export interface Document {
  readonly resources: readonly ResourceDecl[];
}

export const empty: Document = { resources: [] };

export const AddressSchema = Schema.Struct({
  kind: Schema.String,
  name: Schema.String,
});

export const RefSchema = Schema.TaggedStruct("Ref", {
  kind: Schema.String,
  name: Schema.String,
  output: Schema.String,
});

export const ValueSchema: Schema.Schema<Value> = Schema.Union(
  Schema.Null,
  Schema.Boolean,
  Schema.Number,
  Schema.String,
  RefSchema,
  Schema.Array(Schema.suspend(() => ValueSchema)),
  Schema.Record({
    key: Schema.String,
    value: Schema.suspend(() => ValueSchema),
  }),
);

export const AttributesSchema = Schema.Record({
  key: Schema.String,
  value: ValueSchema,
});

export const OrderingHintSchema = Schema.Struct({
  before: Schema.Union(
    Schema.Struct({ category: Schema.String }),
    AddressSchema,
  ),
});

export const ResourceDeclSchema = Schema.Struct({
  kind: Schema.String,
  name: Schema.String,
  category: Schema.optional(Schema.String),
  attributes: AttributesSchema,
  hints: Schema.optional(Schema.Array(OrderingHintSchema)),
  dependsOn: Schema.optional(Schema.Array(AddressSchema)),
});

export const DocumentSchema = Schema.Struct({
  resources: Schema.Array(ResourceDeclSchema),
});

/**
 * Validate a document produced by an external loader.
 */
export const decode = (input: unknown): Effect.Effect<Document, InvalidDocument> =>
  Schema.decodeUnknown(DocumentSchema)(input).pipe(
    Effect.mapError(
      (error) =>
        new InvalidDocument({
          message: ParseResult.TreeFormatter.formatErrorSync(error),
        }),
    ),
  );
