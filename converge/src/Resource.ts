/**
 * Identity of a declared resource. `(kind, name)` is unique within a document.
 */
export interface Address {
  readonly kind: string;
  readonly name: string;
}

/**
 * Reference to an output of another resource. The referencing attribute is
 * not final until the target has been applied and exposes `output`.
 */
export interface Ref extends Address {
  readonly _tag: "Ref";
  readonly output: string;
}

export type Value =
  | null
  | boolean
  | number
  | string
  | Ref
  | readonly Value[]
  | { readonly [key: string]: Value };

export type Attributes = { readonly [key: string]: Value };

/**
 * Targets of an ordering hint: every resource of a category, or one resource.
 */
export type HintTarget = { readonly category: string } | Address;

export interface OrderingHint {
  /** this resource must be applied before the target */
  readonly before: HintTarget;
}

export interface ResourceDecl extends Address {
  /**
   * Category matched by ordering hints.
   *
   * @default kind
   */
  readonly category?: string;
  readonly attributes: Attributes;
  readonly hints?: readonly OrderingHint[];
  /** resources that must be applied before this one */
  readonly dependsOn?: readonly Address[];
}

export const key = (address: Address): string =>
  `${address.kind}.${address.name}`;

export const categoryOf = (resource: {
  kind: string;
  category?: string;
}): string => resource.category ?? resource.kind;

export const ref = (kind: string, name: string, output: string): Ref => ({
  _tag: "Ref",
  kind,
  name,
  output,
});

export const isRef = (value: unknown): value is Ref =>
  typeof value === "object" &&
  value !== null &&
  "_tag" in value &&
  value._tag === "Ref";

export const isCategoryTarget = (
  target: HintTarget,
): target is { readonly category: string } => "category" in target;
