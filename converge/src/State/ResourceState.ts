import type { Handle, Outputs } from "../Provider.ts";
import type { Address, Attributes } from "../Resource.ts";

/**
 * An old instance of a replaced resource that has not been deleted yet.
 */
export interface RetiringInstance {
  handle: Handle;
  outputs: Outputs;
}

/**
 * Last-known state of a resource that exists on the remote control plane.
 */
export interface ResourceState {
  address: Address;
  /** Category the resource had when last applied */
  category: string;
  /** The resolved attributes that were last applied */
  attributes: Attributes;
  /** The outputs the provider reported after the last apply */
  outputs: Outputs;
  /** Provider-assigned identifier of the live instance */
  handle: Handle;
  /** Keys of the resources this resource depended on when last applied */
  dependencies: string[];
  /** Managed outside the document: may be referenced, never deleted */
  external?: boolean;
  /** Old instances left behind by a replace, deleted once nothing uses them */
  retiring?: RetiringInstance[];
}
