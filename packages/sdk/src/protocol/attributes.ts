/**
 * Attribute selection
 *
 * Which attributes `ls` returns, and in which form. On the wire this is `null`,
 * a bare attribute name, or a map of attribute name to mode.
 */

import type { WireAttributeMode, WireAttributes } from "./types";

/**
 * - `single`: one value per attribute
 * - `all`: every value, as a list
 * - `base64`: every value, base64 encoded (binary attributes)
 * - `raw`: the untouched LDAP value (mostly for DNs)
 */
export type AttributeMode = "single" | "all" | "base64" | "raw";

export type AllAttributes = { readonly kind: "all" };
export type SingleAttribute = { readonly kind: "single"; readonly name: string };
export type AttributeSpec = { readonly kind: "spec"; readonly attributes: Readonly<Record<string, AttributeMode>> };

export type AttributeSelection = AllAttributes | SingleAttribute | AttributeSpec;

const WIRE_MODES: Readonly<Record<AttributeMode, WireAttributeMode>> = {
  single: 1,
  all: "*",
  base64: "b64",
  raw: "raw"
};

export const allAttributes = (): AllAttributes => ({ kind: "all" });

export const singleAttribute = (name: string): SingleAttribute => ({ kind: "single", name });

export const attributeSpec = (attributes: Readonly<Record<string, AttributeMode>>): AttributeSpec => ({ kind: "spec", attributes });

/**
 * Converts a selection into the value the `ls` method expects.
 */
export function encodeAttributes(selection: AttributeSelection): WireAttributes {
  switch (selection.kind) {
    case "all":
      return null;
    case "single":
      return selection.name;
    case "spec": {
      const encoded: Record<string, WireAttributeMode> = {};
      for (const [name, mode] of Object.entries(selection.attributes)) {
        encoded[name] = WIRE_MODES[mode];
      }
      return encoded;
    }
  }
}

/**
 * Names of the attributes a selection asks for; empty for `all`.
 */
export function attributeNames(selection: AttributeSelection): string[] {
  switch (selection.kind) {
    case "all":
      return [];
    case "single":
      return [selection.name];
    case "spec":
      return Object.keys(selection.attributes);
  }
}
